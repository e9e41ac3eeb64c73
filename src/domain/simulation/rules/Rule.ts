import type { Group } from "../entities/Group";
import type {
  PopulationView,
  SimulationRule,
  SplitSpecResult,
} from "@/shared/types/simulation/rules";

/**
 * Half-open iteration interval `[start, end)` a rule is active in.
 */
export interface IterationWindow {
  start?: number;
  end?: number;
}

/**
 * Base class for rules.
 *
 * Subclasses implement `apply()` and usually narrow `isApplicable()` to the
 * groups they care about. The default applicability check only tests the
 * iteration window the rule was created with.
 *
 * Rules must not modify the population or the group: every change goes
 * through the split specs they return.
 */
export abstract class Rule implements SimulationRule {
  constructor(
    public readonly name: string,
    protected readonly window: IterationWindow = {},
  ) {}

  public isApplicable(_group: Group, iter: number, _t: number): boolean {
    const { start = -Infinity, end = Infinity } = this.window;
    return iter >= start && iter < end;
  }

  public abstract apply(
    pop: PopulationView,
    group: Group,
    iter: number,
    t: number,
  ): SplitSpecResult;

  public setup(_pop: PopulationView, _group: Group): SplitSpecResult {
    return null;
  }

  public cleanup(_pop: PopulationView, _group: Group): SplitSpecResult {
    return null;
  }

  public toString(): string {
    return `Rule  name: ${this.name}`;
  }
}
