import type { AttrMap, RelMap } from "@/shared/types/simulation/entities";
import type { SplitSpecResult } from "@/shared/types/simulation/rules";
import { cartesianProduct, PROBABILITY_EPSILON } from "@/shared/utils/mathUtils";
import { GroupSplitSpec } from "../entities/GroupSplitSpec";

/**
 * Keeps the rule outcomes that claim the group. A rule that returns nothing
 * or an empty list leaves the group alone.
 */
export function collectClaims(
  results: readonly SplitSpecResult[],
): (readonly GroupSplitSpec[])[] {
  return results.filter(
    (r): r is readonly GroupSplitSpec[] =>
      r !== null && r !== undefined && r.length > 0,
  );
}

/**
 * Replaces the probabilities of one rule's specs with the shares a split
 * would actually give them: the spec that brings the running sum to 1 (or
 * the last spec) takes the remainder, and specs after it are dropped.
 */
export function normalizeSplitSpecs(
  specs: readonly GroupSplitSpec[],
): GroupSplitSpec[] {
  const normalized: GroupSplitSpec[] = [];
  let pSum = 0;
  for (let i = 0; i < specs.length; i++) {
    const spec = specs[i];
    const last =
      i === specs.length - 1 || pSum + spec.p >= 1 - PROBABILITY_EPSILON;
    const p = last ? Math.max(0, 1 - pSum) : spec.p;
    normalized.push(p === spec.p ? spec : spec.withP(p));
    pSum += p;
    if (last) break;
  }
  return normalized;
}

/**
 * Sorts specs by their content hash. The sort is stable, so specs with
 * equal content keep their relative order.
 */
export function orderByContent(
  specs: readonly GroupSplitSpec[],
): GroupSplitSpec[] {
  return [...specs].sort((a, b) => {
    const ha = a.getHash();
    const hb = b.getHash();
    return ha < hb ? -1 : ha > hb ? 1 : 0;
  });
}

/**
 * Composes the outcomes of several independent rules into one joint
 * distribution.
 *
 * Every combination of one spec per rule yields a combined spec whose
 * probability is the product of the individual probabilities. Set-maps are
 * merged in rule order (a later rule overwrites an earlier one on the same
 * key) and delete sets are unioned. Each rule's specs are normalized first,
 * so a trailing spec left at p = 0 still receives its complement.
 */
export function combineSplitSpecs(
  claims: readonly (readonly GroupSplitSpec[])[],
): GroupSplitSpec[] {
  return cartesianProduct(claims.map(normalizeSplitSpecs)).map((tuple) => {
    let p = 1;
    const attrSet: AttrMap = {};
    const attrDel = new Set<string>();
    const relSet: RelMap = {};
    const relDel = new Set<string>();

    for (const spec of tuple) {
      p *= spec.p;
      Object.assign(attrSet, spec.attrSet);
      spec.attrDel.forEach((k) => attrDel.add(k));
      Object.assign(relSet, spec.relSet);
      spec.relDel.forEach((k) => relDel.add(k));
    }

    return new GroupSplitSpec({ p, attrSet, attrDel, relSet, relDel });
  });
}
