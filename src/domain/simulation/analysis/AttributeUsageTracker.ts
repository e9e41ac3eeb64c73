import type { UsageObserver } from "@/shared/types/simulation/entities";
import type { ReadonlyGroup } from "../entities/Group";

export interface AttributeUsageReport {
  attrUsed: string[];
  relUsed: string[];
  /** Attributes defining groups that no rule conditioned on. */
  attrUnused: string[];
  /** Relations defining groups that no rule conditioned on. */
  relUnused: string[];
}

/**
 * Records the attribute and relation names read while rules run.
 *
 * Names that partition the population into groups but are never read are
 * candidates for removal: they multiply groups without affecting any rule.
 * Usage accumulates over consecutive runs of the same simulation.
 */
export class AttributeUsageTracker implements UsageObserver {
  private readonly attrUsed = new Set<string>();
  private readonly relUsed = new Set<string>();

  public recordAttr(name: string): void {
    this.attrUsed.add(name);
  }

  public recordRel(name: string): void {
    this.relUsed.add(name);
  }

  public analyze(groups: Iterable<ReadonlyGroup>): AttributeUsageReport {
    const attrGroups = new Set<string>();
    const relGroups = new Set<string>();
    for (const g of groups) {
      Object.keys(g.getAttrs()).forEach((k) => attrGroups.add(k));
      Object.keys(g.getRelRefs()).forEach((k) => relGroups.add(k));
    }

    return {
      attrUsed: [...this.attrUsed].sort(),
      relUsed: [...this.relUsed].sort(),
      attrUnused: [...attrGroups].filter((k) => !this.attrUsed.has(k)).sort(),
      relUnused: [...relGroups].filter((k) => !this.relUsed.has(k)).sort(),
    };
  }

  public reset(): void {
    this.attrUsed.clear();
    this.relUsed.clear();
  }
}
