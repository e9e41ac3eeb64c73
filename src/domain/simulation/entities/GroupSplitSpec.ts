import type { AttrMap, RelMap } from "@/shared/types/simulation/entities";
import { InvalidProbabilityError } from "../errors";
import { canonicalEntries, digest } from "./ContentHash";

export interface GroupSplitSpecOptions {
  /** Probability of the split. Defaults to 0 so that a trailing spec takes the complement. */
  p?: number;
  attrSet?: AttrMap;
  attrDel?: Iterable<string>;
  relSet?: RelMap;
  relDel?: Iterable<string>;
}

/**
 * Describes one destination of a group split: the share of the group's mass
 * it receives and how the destination's attributes and relations differ from
 * the source's.
 *
 * Values set through `attrSet`/`relSet` overwrite existing values; keys in
 * `attrDel`/`relDel` are removed after the set-maps are applied.
 */
export class GroupSplitSpec {
  public readonly p: number;
  public readonly attrSet: Readonly<AttrMap>;
  public readonly attrDel: ReadonlySet<string>;
  public readonly relSet: Readonly<RelMap>;
  public readonly relDel: ReadonlySet<string>;

  private hash: string | null = null;

  constructor(options: GroupSplitSpecOptions = {}) {
    const p = options.p ?? 0;
    if (!Number.isFinite(p) || p < 0 || p > 1) {
      throw new InvalidProbabilityError(p);
    }
    this.p = p;
    this.attrSet = { ...options.attrSet };
    this.attrDel = new Set(options.attrDel ?? []);
    this.relSet = { ...options.relSet };
    this.relDel = new Set(options.relDel ?? []);
  }

  /**
   * Hash of what the spec changes, ignoring its probability.
   */
  public getHash(): string {
    if (this.hash === null) {
      this.hash = digest([
        "split",
        canonicalEntries(this.attrSet),
        [...this.attrDel].sort(),
        canonicalEntries(this.relSet),
        [...this.relDel].sort(),
      ]);
    }
    return this.hash;
  }

  /**
   * Copy of the spec with another probability.
   */
  public withP(p: number): GroupSplitSpec {
    return new GroupSplitSpec({
      p,
      attrSet: this.attrSet,
      attrDel: this.attrDel,
      relSet: this.relSet,
      relDel: this.relDel,
    });
  }

  public toJSON(): Record<string, unknown> {
    return {
      p: this.p,
      attrSet: this.attrSet,
      attrDel: [...this.attrDel],
      relSet: Object.keys(this.relSet),
      relDel: [...this.relDel],
    };
  }

  public toString(): string {
    return `GroupSplitSpec  p: ${this.p}  attrSet: ${JSON.stringify(this.attrSet)}  attrDel: ${JSON.stringify([...this.attrDel])}  relSet: ${JSON.stringify(Object.keys(this.relSet))}  relDel: ${JSON.stringify([...this.relDel])}`;
  }
}
