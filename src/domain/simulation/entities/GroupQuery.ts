import type { AttrMap, AttrValue, RelMap } from "@/shared/types/simulation/entities";
import { canonicalEntries, digest, toHashRef } from "./ContentHash";
import type { ReadonlyGroup } from "./Group";

/**
 * Custom condition on a group. Receives the group read-only.
 */
export type GroupPredicate = (group: ReadonlyGroup) => boolean;

/**
 * One condition of a query.
 *
 * Attribute and relation conditions are plain data and take part in the
 * query's content hash. Predicates are opaque functions and take part only
 * through their reference identity.
 */
export type QueryCondition =
  | { readonly kind: "attr"; readonly attr: Readonly<AttrMap> }
  | { readonly kind: "rel"; readonly rel: Readonly<Record<string, AttrValue>> }
  | { readonly kind: "predicate"; readonly fn: GroupPredicate };

export interface GroupQueryOptions {
  attr?: AttrMap;
  rel?: RelMap;
  cond?: GroupPredicate[];
  /** Require exact attribute and relation equality instead of containment. */
  full?: boolean;
}

const predicateIds = new WeakMap<GroupPredicate, number>();
let nextPredicateId = 1;

function predicateId(fn: GroupPredicate): number {
  let id = predicateIds.get(fn);
  if (id === undefined) {
    id = nextPredicateId++;
    predicateIds.set(fn, id);
  }
  return id;
}

function containsAll(
  query: Readonly<Record<string, AttrValue>>,
  target: Readonly<Record<string, AttrValue>>,
): boolean {
  for (const key of Object.keys(query)) {
    if (!(key in target) || target[key] !== query[key]) {
      return false;
    }
  }
  return true;
}

function sameEntries(
  a: Readonly<Record<string, AttrValue>>,
  b: Readonly<Record<string, AttrValue>>,
): boolean {
  return (
    Object.keys(a).length === Object.keys(b).length && containsAll(a, b)
  );
}

/**
 * A group query.
 *
 * Selects groups by attribute and relation content and by custom predicates:
 *
 *     new GroupQuery({ attr: { flu: "s" } })                    // susceptible to the flu
 *     new GroupQuery({ rel: { [Site.AT]: school } })             // currently at `school`
 *     new GroupQuery({ cond: [(g) => Number(g.getAttr("age")) > 65] })
 *
 * A partial match requires the group to contain the query's attributes and
 * relations. A full match requires them to be equal, so it selects at most
 * one group of a population.
 */
export class GroupQuery {
  public readonly attr: Readonly<AttrMap>;
  /** Relations with entity references replaced by their hashes. */
  public readonly rel: Readonly<Record<string, AttrValue>>;
  public readonly cond: readonly GroupPredicate[];
  public readonly full: boolean;
  public readonly conditions: readonly QueryCondition[];

  private hash: string | null = null;

  constructor(options: GroupQueryOptions = {}) {
    this.attr = { ...options.attr };
    const rel: Record<string, AttrValue> = {};
    for (const [key, value] of Object.entries(options.rel ?? {})) {
      rel[key] = toHashRef(value);
    }
    this.rel = rel;
    this.cond = [...(options.cond ?? [])];
    this.full = options.full ?? false;

    this.conditions = [
      { kind: "attr", attr: this.attr },
      { kind: "rel", rel: this.rel },
      ...this.cond.map((fn) => ({ kind: "predicate" as const, fn })),
    ];
  }

  /**
   * Checks a group against every condition of the query.
   */
  public matches(group: ReadonlyGroup): boolean {
    const observer = group.getUsageObserver();

    for (const condition of this.conditions) {
      switch (condition.kind) {
        case "attr": {
          if (observer) {
            Object.keys(condition.attr).forEach((k) => observer.recordAttr(k));
          }
          const attrs = group.getAttrs();
          const ok = this.full
            ? sameEntries(condition.attr, attrs)
            : containsAll(condition.attr, attrs);
          if (!ok) return false;
          break;
        }
        case "rel": {
          if (observer) {
            Object.keys(condition.rel).forEach((k) => observer.recordRel(k));
          }
          const rels = group.getRelRefs();
          const ok = this.full
            ? sameEntries(condition.rel, rels)
            : containsAll(condition.rel, rels);
          if (!ok) return false;
          break;
        }
        case "predicate":
          if (!condition.fn(group)) return false;
          break;
      }
    }
    return true;
  }

  /**
   * Deterministic hash used as a cache key. Queries with equal content and
   * the same predicate functions hash equal.
   */
  public getHash(): string {
    if (this.hash === null) {
      this.hash = digest([
        "query",
        canonicalEntries(this.attr),
        canonicalEntries(this.rel),
        this.cond.map(predicateId),
        this.full,
      ]);
    }
    return this.hash;
  }

  public equals(other: unknown): boolean {
    return other instanceof GroupQuery && other.getHash() === this.getHash();
  }
}
