import type { Group } from "@/domain/simulation/entities/Group";
import type { GroupQuery } from "@/domain/simulation/entities/GroupQuery";
import type { GroupSplitSpec } from "@/domain/simulation/entities/GroupSplitSpec";
import type { Site } from "@/domain/simulation/entities/Site";
import type { AttrMap, RelMap } from "./entities";

/**
 * Outcome of a rule for one group. `null`, `undefined` and an empty list all
 * mean the rule makes no claim on the group.
 */
export type SplitSpecResult = readonly GroupSplitSpec[] | null | undefined;

/**
 * Read-only view of the population handed to rules and probes.
 */
export interface PopulationView {
  getMass(): number;
  getGroup(attr: AttrMap, rel?: RelMap): Group | undefined;
  getGroups(qry?: GroupQuery | null): readonly Group[];
  getGroupsMass(qry?: GroupQuery | null, histDelta?: number): number;
  getGroupsMassProp(qry?: GroupQuery | null): number;
  getGroupsMassAndProp(qry?: GroupQuery | null): [number, number];
  getGroupCnt(onlyNonEmpty?: boolean): number;
  getSite(hash: string): Site | undefined;
  getSiteCnt(): number;
}

/**
 * Contract every rule fulfils.
 *
 * Rules must be pure functions of their arguments: all changes to the
 * population flow through the returned split specs.
 */
export interface SimulationRule {
  readonly name: string;
  isApplicable(group: Group, iter: number, t: number): boolean;
  apply(pop: PopulationView, group: Group, iter: number, t: number): SplitSpecResult;
  setup?(pop: PopulationView, group: Group): SplitSpecResult;
  cleanup?(pop: PopulationView, group: Group): SplitSpecResult;
}

/**
 * Function run once per group before the first iteration of a simulation.
 */
export type GroupSetupFn = (pop: PopulationView, group: Group) => SplitSpecResult;

/**
 * Read-only observer invoked after every iteration. `iter` and `t` are null
 * when the probe captures the initial state.
 */
export interface Probe {
  readonly name: string;
  setPopulation(pop: PopulationView): void;
  run(iter: number | null, t: number | null): void;
}
