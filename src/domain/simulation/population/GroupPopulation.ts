import { inject, injectable } from "inversify";
import type { SimulationConfig } from "@/config/config";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { PopulationPhase, RuleMode } from "@/shared/constants/SimulationEnums";
import type {
  AttrMap,
  EntityRegistry,
  EntityResolver,
  RelMap,
  UsageObserver,
} from "@/shared/types/simulation/entities";
import type {
  GroupSetupFn,
  PopulationView,
  SimulationRule,
} from "@/shared/types/simulation/rules";
import { fsum } from "@/shared/utils/mathUtils";
import { hashContent } from "../entities/ContentHash";
import type { Group } from "../entities/Group";
import type { GroupQuery } from "../entities/GroupQuery";
import { Resource } from "../entities/Resource";
import { Site } from "../entities/Site";
import { HistoryDepthError, PopulationUsageError } from "../errors";
import {
  PopulationHistory,
  type PopulationHistoryEntry,
} from "./PopulationHistory";

/**
 * Mass moving out of one group during an iteration.
 */
export interface MassFlowSpec {
  /** Population mass at the time of the flow. */
  readonly mPop: number;
  readonly src: Group;
  readonly dst: readonly Group[];
}

/**
 * What happened during the most recent application of rules.
 */
export interface LastIterationInfo {
  readonly iter: number | null;
  readonly t: number | null;
  /** Mass that moved into a group other than its source. */
  readonly massFlowTotal: number;
  /** Kept only when the population is configured to keep them. */
  readonly massFlowSpecs: readonly MassFlowSpec[] | null;
}

/**
 * A population of groups.
 *
 * The population owns every group, site and resource of a simulation and
 * guarantees that at most one group with a given content exists: groups
 * with equal attributes and relations are merged. An iteration applies
 * rules to every group, computing all destination groups before moving any
 * mass, then transfers the mass at once. `postIteration()` afterwards
 * removes mass that left the simulation (VOID groups) and adds mass that
 * entered it (VITA groups).
 *
 * The population mass stays constant through rule application; it changes
 * only when groups are added from outside or during post-iteration.
 */
@injectable()
export class GroupPopulation
  implements PopulationView, EntityResolver, EntityRegistry
{
  public usageObserver: UsageObserver | null = null;

  private groups = new Map<string, Group>();
  private sites = new Map<string, Site>();
  private resources = new Map<string, Resource>();
  private vitaGroups = new Map<string, Group>();

  private mass = 0;
  private massIn = 0;
  private massOut = 0;

  private groupsCache = new Map<string, readonly Group[]>();
  private massCache = new Map<string, number>();

  private readonly history: PopulationHistory;
  private readonly keepMassFlowSpecs: boolean;
  private fractionalMass: boolean;
  private phase = PopulationPhase.IDLE;
  private lastIter: LastIterationInfo = {
    iter: null,
    t: null,
    massFlowTotal: 0,
    massFlowSpecs: null,
  };

  constructor(@inject(TYPES.SimulationConfig) config: SimulationConfig) {
    this.history = new PopulationHistory(config.historyLength);
    this.keepMassFlowSpecs = config.keepMassFlowSpecs;
    this.fractionalMass = config.fractionalMass;
  }

  // ---- Registration ---------------------------------------------------------

  /**
   * Adds a group from outside the simulation. Its mass is credited to the
   * population. A group with equal content that already exists absorbs the
   * mass; otherwise the group is registered and frozen, and the sites and
   * resources its relations point to are registered as well.
   */
  public addGroup(group: Group): this {
    this.mass += group.mass;
    this.registerGroup(group, true);
    this.resetCache();
    return this;
  }

  public addGroups(groups: Iterable<Group>): this {
    for (const g of groups) {
      this.addGroup(g);
    }
    return this;
  }

  /**
   * Registers a site. Returns the registered instance, which is a
   * previously added equal site when one exists.
   */
  public addSite(site: Site): Site {
    const hash = site.getHash();
    const existing = this.sites.get(hash);
    if (existing) {
      return existing;
    }
    this.sites.set(hash, site);
    logger.debug(`Site registered: ${site.name}`, LogCategory.SITES, { hash });
    return site;
  }

  public addSites(sites: Iterable<Site>): this {
    for (const s of sites) {
      this.addSite(s);
    }
    return this;
  }

  public addResource(resource: Resource): Resource {
    const hash = resource.getHash();
    const existing = this.resources.get(hash);
    if (existing) {
      return existing;
    }
    this.resources.set(hash, resource);
    return resource;
  }

  public addResources(resources: Iterable<Resource>): this {
    for (const r of resources) {
      this.addResource(r);
    }
    return this;
  }

  public registerEntity(entity: Resource): Resource {
    return entity instanceof Site
      ? this.addSite(entity)
      : this.addResource(entity);
  }

  public resolveEntity(hash: string): Resource | undefined {
    return this.sites.get(hash) ?? this.resources.get(hash);
  }

  /**
   * Adds mass that enters the simulation at the next post-iteration. VITA
   * groups with equal content merge.
   */
  public addVitaGroup(group: Group): this {
    const existing = this.vitaGroups.get(group.getHash());
    if (existing) {
      existing.mass += group.mass;
    } else {
      this.vitaGroups.set(group.getHash(), group);
    }
    return this;
  }

  public setUsageObserver(observer: UsageObserver | null): this {
    this.usageObserver = observer;
    return this;
  }

  public setFractionalMass(value: boolean): this {
    this.fractionalMass = value;
    return this;
  }

  public isFractionalMass(): boolean {
    return this.fractionalMass;
  }

  /**
   * Registers a group without crediting population mass. Mass moved by
   * transfers is already accounted for.
   */
  private registerGroup(group: Group, link: boolean): void {
    const existing = this.groups.get(group.getHash());
    if (existing) {
      existing.mass += group.mass;
      if (link) {
        existing.getLinkedSites().forEach((s) => s.invalidate());
      }
      return;
    }

    group.register(this);
    this.groups.set(group.getHash(), group);
    if (link) {
      group.linkToSites();
    }
  }

  // ---- Iteration ------------------------------------------------------------

  /**
   * Applies rules to every group and transfers the resulting mass.
   *
   * @throws PopulationUsageError when the previous iteration still awaits
   *   `postIteration()`
   */
  public applyRules(
    rules: readonly SimulationRule[],
    iter: number,
    t: number,
    mode: RuleMode = RuleMode.ITERATION,
  ): this {
    return this.applyToGroups(
      (g) =>
        g.applyRules(this, rules, iter, t, mode, {
          fractionalMass: this.fractionalMass,
          registry: this,
        }),
      iter,
      t,
    );
  }

  /**
   * Splits every group according to a simulation setup function.
   */
  public applySetupFn(fn: GroupSetupFn, iter: number, t: number): this {
    return this.applyToGroups(
      (g) =>
        g.applySetupFn(this, fn, {
          fractionalMass: this.fractionalMass,
          registry: this,
        }),
      iter,
      t,
    );
  }

  private applyToGroups(
    split: (group: Group) => Group[] | null,
    iter: number,
    t: number,
  ): this {
    if (this.phase === PopulationPhase.MASS_TRANSFERRED) {
      throw new PopulationUsageError(
        "Rules applied while the previous iteration awaits postIteration().",
      );
    }

    const flows: MassFlowSpec[] = [];
    const srcHashes = new Set<string>();
    for (const g of this.groups.values()) {
      const dst = split(g);
      if (dst !== null) {
        flows.push({ mPop: this.mass, src: g, dst });
        srcHashes.add(g.getHash());
      }
    }
    this.phase = PopulationPhase.RULES_APPLIED;

    if (flows.length === 0) {
      this.lastIter = {
        iter,
        t,
        massFlowTotal: 0,
        massFlowSpecs: this.keepMassFlowSpecs ? [] : null,
      };
      this.phase = PopulationPhase.MASS_TRANSFERRED;
      return this;
    }

    return this.transferMass(srcHashes, flows, iter, t);
  }

  /**
   * Moves mass from source groups to destination groups. Sources are
   * emptied first; destinations merge into existing groups or are
   * registered.
   */
  public transferMass(
    srcHashes: Iterable<string>,
    flows: readonly MassFlowSpec[],
    iter: number | null = null,
    t: number | null = null,
  ): this {
    for (const h of srcHashes) {
      const src = this.groups.get(h);
      if (src) {
        src.mass = 0;
      }
    }

    let massFlowTotal = 0;
    for (const flow of flows) {
      const srcHash = flow.src.getHash();
      for (const dst of flow.dst) {
        this.registerGroup(dst, false);
        if (dst.getHash() !== srcHash) {
          massFlowTotal += dst.mass;
        }
      }
    }

    this.lastIter = {
      iter,
      t,
      massFlowTotal,
      massFlowSpecs: this.keepMassFlowSpecs ? flows : null,
    };

    this.relinkSites();
    this.resetCache();
    this.archive();
    this.phase = PopulationPhase.MASS_TRANSFERRED;

    logger.debug(
      `Mass transferred: ${massFlowTotal} of ${this.mass} across ${flows.length} groups`,
      LogCategory.POPULATION,
      { iter, t },
    );
    return this;
  }

  /**
   * Removes VOID groups and folds VITA groups into the population.
   */
  public postIteration(): this {
    let voidMass = 0;
    for (const [hash, g] of this.groups) {
      if (g.isVoid()) {
        voidMass += g.mass;
        this.groups.delete(hash);
      }
    }
    this.mass -= voidMass;
    this.massOut += voidMass;

    let vitaMass = 0;
    for (const g of this.vitaGroups.values()) {
      vitaMass += g.mass;
      this.registerGroup(g, false);
    }
    this.mass += vitaMass;
    this.massIn += vitaMass;
    this.vitaGroups.clear();

    this.relinkSites();
    this.resetCache();
    this.phase = PopulationPhase.POST_ITER_CLEANED;

    if (voidMass > 0 || vitaMass > 0) {
      logger.debug(
        `Post-iteration: ${voidMass} mass removed, ${vitaMass} mass added`,
        LogCategory.POPULATION,
      );
    }
    return this;
  }

  /**
   * Removes empty groups.
   */
  public compact(): this {
    for (const [hash, g] of this.groups) {
      if (g.mass <= 0) {
        this.groups.delete(hash);
      }
    }
    this.relinkSites();
    this.resetCache();
    return this;
  }

  private relinkSites(): void {
    for (const s of this.sites.values()) {
      s.resetGroupLinks();
    }
    for (const g of this.groups.values()) {
      g.linkToSites();
    }
  }

  private resetCache(): void {
    this.groupsCache.clear();
    this.massCache.clear();
  }

  private archive(): void {
    const groups = new Map<string, number>();
    for (const [hash, g] of this.groups) {
      groups.set(hash, g.mass);
    }
    this.history.push({
      mass: this.mass,
      massIn: this.massIn,
      massOut: this.massOut,
      groups,
    });
  }

  // ---- Queries --------------------------------------------------------------

  public getGroup(attr: AttrMap, rel: RelMap = {}): Group | undefined {
    return this.groups.get(hashContent(attr, rel));
  }

  public getGroupByHash(hash: string): Group | undefined {
    return this.groups.get(hash);
  }

  /**
   * Groups matching the query, or all groups. Results are memoized until
   * the next mass transfer, post-iteration or compaction.
   */
  public getGroups(qry: GroupQuery | null = null): readonly Group[] {
    const key = qry ? qry.getHash() : "*";
    let groups = this.groupsCache.get(key);
    if (groups === undefined) {
      groups = [...this.groups.values()].filter((g) => g.matches(qry));
      this.groupsCache.set(key, groups);
    }
    return groups;
  }

  /**
   * Mass of the groups matching the query. With `histDelta` > 0, the change
   * of that mass relative to the snapshot `histDelta` transfers back (0
   * while the history is still shorter than that).
   *
   * @throws HistoryDepthError when `histDelta` exceeds the history length
   */
  public getGroupsMass(qry: GroupQuery | null = null, histDelta: number = 0): number {
    if (histDelta === 0) {
      const key = qry ? qry.getHash() : "*";
      let m = this.massCache.get(key);
      if (m === undefined) {
        m = fsum(this.getGroups(qry).map((g) => g.mass));
        this.massCache.set(key, m);
      }
      return m;
    }

    if (histDelta > this.history.capacity) {
      throw new HistoryDepthError(histDelta, this.history.capacity);
    }
    const entry = this.history.get(histDelta);
    if (!entry) {
      return 0;
    }
    return fsum(
      this.getGroups(qry).map(
        (g) => g.mass - (entry.groups.get(g.getHash()) ?? 0),
      ),
    );
  }

  public getGroupsMassProp(qry: GroupQuery | null = null): number {
    return this.mass > 0 ? this.getGroupsMass(qry) / this.mass : 0;
  }

  public getGroupsMassAndProp(qry: GroupQuery | null = null): [number, number] {
    const m = this.getGroupsMass(qry);
    return [m, this.mass > 0 ? m / this.mass : 0];
  }

  public getGroupCnt(onlyNonEmpty: boolean = false): number {
    if (!onlyNonEmpty) {
      return this.groups.size;
    }
    let n = 0;
    for (const g of this.groups.values()) {
      if (g.mass > 0) n++;
    }
    return n;
  }

  public getSite(hash: string): Site | undefined {
    return this.sites.get(hash);
  }

  public getSites(): readonly Site[] {
    return [...this.sites.values()];
  }

  public getSiteCnt(): number {
    return this.sites.size;
  }

  public getResource(hash: string): Resource | undefined {
    return this.resources.get(hash);
  }

  public getResourceCnt(): number {
    return this.resources.size;
  }

  public getMass(): number {
    return this.mass;
  }

  public getMassIn(): number {
    return this.massIn;
  }

  public getMassOut(): number {
    return this.massOut;
  }

  public getVitaGroupCnt(): number {
    return this.vitaGroups.size;
  }

  public getNextGroupName(): string {
    return `g.${this.groups.size}`;
  }

  public getPhase(): PopulationPhase {
    return this.phase;
  }

  public getLastIteration(): LastIterationInfo {
    return this.lastIter;
  }

  public getHistoryLength(): number {
    return this.history.length;
  }

  public getHistoryEntry(delta: number): PopulationHistoryEntry | undefined {
    return this.history.get(delta);
  }

  public toJSON(): Record<string, unknown> {
    return {
      mass: this.mass,
      massIn: this.massIn,
      massOut: this.massOut,
      groupCnt: this.groups.size,
      siteCnt: this.sites.size,
      resourceCnt: this.resources.size,
      phase: this.phase,
    };
  }
}
