import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import type { PopulationView, Probe } from "@/shared/types/simulation/rules";
import type { GroupQuery } from "../entities/GroupQuery";

/**
 * One labelled query a probe tracks.
 */
export interface ProbeSeries {
  name: string;
  qry: GroupQuery | null;
}

export interface ProbeRow {
  iter: number | null;
  t: number | null;
  /** Series name to mass (or mass proportion). */
  values: Record<string, number>;
}

export interface GroupMassProbeOptions {
  /** Record mass proportions instead of masses. */
  asProportion?: boolean;
}

/**
 * Records the mass of groups matching a set of queries after every
 * iteration.
 */
export class GroupMassProbe implements Probe {
  private pop: PopulationView | null = null;
  private readonly rows: ProbeRow[] = [];
  private readonly asProportion: boolean;

  constructor(
    public readonly name: string,
    private readonly series: readonly ProbeSeries[],
    options: GroupMassProbeOptions = {},
  ) {
    this.asProportion = options.asProportion ?? false;
  }

  public setPopulation(pop: PopulationView): void {
    this.pop = pop;
  }

  public run(iter: number | null, t: number | null): void {
    const pop = this.pop;
    if (!pop) {
      logger.warn(`Probe '${this.name}' has no population`, LogCategory.SIMULATION);
      return;
    }

    const values: Record<string, number> = {};
    for (const s of this.series) {
      values[s.name] = this.asProportion
        ? pop.getGroupsMassProp(s.qry)
        : pop.getGroupsMass(s.qry);
    }
    this.rows.push({ iter, t, values });
  }

  public getRows(): readonly ProbeRow[] {
    return this.rows;
  }

  public getSeries(name: string): number[] {
    return this.rows.map((r) => r.values[name]);
  }

  public clear(): void {
    this.rows.length = 0;
  }
}
