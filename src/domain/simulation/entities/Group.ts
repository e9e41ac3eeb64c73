import { EntityState, EntityType } from "@/shared/constants/EntityEnums";
import { RuleMode } from "@/shared/constants/SimulationEnums";
import type {
  AttrMap,
  AttrValue,
  EntityRegistry,
  EntityResolver,
  RelMap,
  RelValue,
  UsageObserver,
} from "@/shared/types/simulation/entities";
import type {
  GroupSetupFn,
  PopulationView,
  SimulationRule,
  SplitSpecResult,
} from "@/shared/types/simulation/rules";
import { PROBABILITY_EPSILON, roundPreservingTotal } from "@/shared/utils/mathUtils";
import { GroupFrozenError } from "../errors";
import {
  collectClaims,
  combineSplitSpecs,
  orderByContent,
} from "../population/RuleCombinator";
import { hashContent, toHashRef } from "./ContentHash";
import type { GroupQuery } from "./GroupQuery";
import type { GroupSplitSpec } from "./GroupSplitSpec";
import { Resource } from "./Resource";
import { Site } from "./Site";

/**
 * Read-only face of a group, handed to query predicates.
 */
export interface ReadonlyGroup {
  readonly name: string;
  readonly mass: number;
  getAttr(name: string): AttrValue | undefined;
  getAttrs(): Readonly<AttrMap>;
  getRel(name: string): RelValue | undefined;
  getRelRefs(): Readonly<Record<string, AttrValue>>;
  hasAttr(qry: string | string[] | AttrMap): boolean;
  hasRel(qry: string | string[] | RelMap): boolean;
  getSiteAt(): Site | undefined;
  isAtSite(site: Site): boolean;
  isAtSiteName(name: string): boolean;
  isVoid(): boolean;
  getHash(): string;
  getUsageObserver(): UsageObserver | null;
}

/**
 * Population a group registers with: resolves relation hashes to entities
 * and registers the entities new relations point to.
 */
export type GroupOwner = EntityResolver & EntityRegistry;

export interface GroupSplitOptions {
  /** Keep split masses fractional instead of rounding them to integers. */
  fractionalMass?: boolean;
  /** Registry entity relations of the new groups are registered with. */
  registry?: EntityRegistry | null;
}

/**
 * A group of agents.
 *
 * All agents of a group are functionally identical: they share the same
 * attributes and relations, and it is exactly those that define the group.
 * Name and mass are not part of a group's identity. Groups are split by
 * rules into new groups, which the population merges with existing groups of
 * equal content.
 *
 * Relations to sites and resources are stored by content hash once the group
 * is registered with a population; `getRel()` resolves them back to the
 * registered entities.
 */
export class Group implements ReadonlyGroup {
  /**
   * Attributes flagging a group for removal. Mass that moves into a VOID
   * group leaves the simulation at the end of the iteration.
   */
  public static readonly VOID: Readonly<AttrMap> = Object.freeze({
    __void__: true,
  });

  public readonly name: string;
  public mass: number;

  private attr: AttrMap;
  private rel: RelMap;
  private hash: string | null = null;
  private relRefs: Record<string, AttrValue> | null = null;
  private state = EntityState.STANDALONE;
  private owner: GroupOwner | null = null;

  constructor(
    name: string | null = null,
    mass: number = 0,
    attr: AttrMap | null = null,
    rel: RelMap | null = null,
  ) {
    this.name = name ?? "";
    this.mass = mass;
    this.attr = { ...attr };
    this.rel = { ...rel };
  }

  public get type(): EntityType {
    return EntityType.GROUP;
  }

  public getState(): EntityState {
    return this.state;
  }

  public isRegistered(): boolean {
    return this.state === EntityState.REGISTERED;
  }

  // ---- Content --------------------------------------------------------------

  public getAttr(name: string): AttrValue | undefined {
    this.getUsageObserver()?.recordAttr(name);
    return this.attr[name];
  }

  public getAttrs(): Readonly<AttrMap> {
    return this.attr;
  }

  /**
   * Value of a relation. Hashes of registered entities resolve to the
   * entities themselves.
   */
  public getRel(name: string): RelValue | undefined {
    this.getUsageObserver()?.recordRel(name);
    const value = this.rel[name];
    if (typeof value === "string" && this.owner) {
      return this.owner.resolveEntity(value) ?? value;
    }
    return value;
  }

  public getRels(): Readonly<RelMap> {
    return this.rel;
  }

  /**
   * Relations with entity references replaced by their hashes.
   */
  public getRelRefs(): Readonly<Record<string, AttrValue>> {
    if (this.relRefs === null) {
      const refs: Record<string, AttrValue> = {};
      for (const [key, value] of Object.entries(this.rel)) {
        refs[key] = toHashRef(value);
      }
      this.relRefs = refs;
    }
    return this.relRefs;
  }

  /**
   * Checks attributes by name (string or list of names) or by name and
   * value (map).
   */
  public hasAttr(qry: string | string[] | AttrMap): boolean {
    const observer = this.getUsageObserver();
    if (typeof qry === "string") {
      observer?.recordAttr(qry);
      return qry in this.attr;
    }
    if (Array.isArray(qry)) {
      qry.forEach((k) => observer?.recordAttr(k));
      return qry.every((k) => k in this.attr);
    }
    return Object.entries(qry).every(([k, v]) => {
      observer?.recordAttr(k);
      return k in this.attr && this.attr[k] === v;
    });
  }

  /**
   * Checks relations by name or by name and value. Entity values compare by
   * hash.
   */
  public hasRel(qry: string | string[] | RelMap): boolean {
    const observer = this.getUsageObserver();
    const refs = this.getRelRefs();
    if (typeof qry === "string") {
      observer?.recordRel(qry);
      return qry in refs;
    }
    if (Array.isArray(qry)) {
      qry.forEach((k) => observer?.recordRel(k));
      return qry.every((k) => k in refs);
    }
    return Object.entries(qry).every(([k, v]) => {
      observer?.recordRel(k);
      return k in refs && refs[k] === toHashRef(v);
    });
  }

  /**
   * Site the group currently resides at (the `@` relation), if any.
   */
  public getSiteAt(): Site | undefined {
    const at = this.getRel(Site.AT);
    return at instanceof Site ? at : undefined;
  }

  public isAtSite(site: Site): boolean {
    return this.getRelRefs()[Site.AT] === site.getHash();
  }

  public isAtSiteName(name: string): boolean {
    return this.getSiteAt()?.name === name;
  }

  public isVoid(): boolean {
    return this.attr.__void__ === true;
  }

  public matches(qry: GroupQuery | null = null): boolean {
    return qry === null || qry.matches(this);
  }

  public getUsageObserver(): UsageObserver | null {
    return this.owner?.usageObserver ?? null;
  }

  // ---- Mutation (standalone groups only) ------------------------------------

  public setAttr(name: string, value: AttrValue, force: boolean = false): this {
    if (this.isRegistered() && !force) {
      throw new GroupFrozenError("attribute", name);
    }
    this.attr[name] = value;
    this.resetHash();
    return this;
  }

  public setAttrs(attr: AttrMap, force: boolean = false): this {
    for (const [name, value] of Object.entries(attr)) {
      this.setAttr(name, value, force);
    }
    return this;
  }

  public setRel(name: string, value: RelValue, force: boolean = false): this {
    if (this.isRegistered() && !force) {
      throw new GroupFrozenError("relation", name);
    }
    this.rel[name] = value instanceof Resource && this.owner
      ? this.owner.registerEntity(value).getHash()
      : value;
    this.resetHash();
    return this;
  }

  public setRels(rel: RelMap, force: boolean = false): this {
    for (const [name, value] of Object.entries(rel)) {
      this.setRel(name, value, force);
    }
    return this;
  }

  // ---- Identity -------------------------------------------------------------

  public getHash(): string {
    if (this.hash === null) {
      this.hash = hashContent(this.attr, this.rel);
    }
    return this.hash;
  }

  public equals(other: unknown): boolean {
    return other instanceof Group && other.getHash() === this.getHash();
  }

  private resetHash(): void {
    this.hash = null;
    this.relRefs = null;
  }

  // ---- Population bookkeeping -----------------------------------------------

  /**
   * Binds the group to a population. Entities the relations point to are
   * registered and replaced by their hashes.
   *
   * @internal
   */
  public register(owner: GroupOwner): this {
    for (const [key, value] of Object.entries(this.rel)) {
      if (value instanceof Resource) {
        this.rel[key] = owner.registerEntity(value).getHash();
      }
    }
    this.owner = owner;
    this.state = EntityState.REGISTERED;
    this.resetHash();
    return this;
  }

  /**
   * Sites the group references under the site's own relation name (`@`
   * unless the site was created with another one).
   */
  public getLinkedSites(): Site[] {
    const sites: Site[] = [];
    for (const [key, value] of Object.entries(this.rel)) {
      const entity =
        typeof value === "string" ? this.owner?.resolveEntity(value) : value;
      if (entity instanceof Site && entity.relName === key) {
        sites.push(entity);
      }
    }
    return sites;
  }

  /**
   * Adds the group to the member lists of its linked sites.
   *
   * @internal
   */
  public linkToSites(): this {
    for (const site of this.getLinkedSites()) {
      site.addGroupLink(this);
    }
    return this;
  }

  // ---- Splitting ------------------------------------------------------------

  /**
   * Applies rules to the group and splits it according to their combined
   * outcome.
   *
   * In ITERATION mode only applicable rules are consulted. SETUP and CLEANUP
   * call the rules' hooks unconditionally; rules without the hook make no
   * claim.
   *
   * Combined specs are split in content order, so rounding ties resolve the
   * same way whatever order the rules are listed in.
   *
   * @returns New groups, or null when no rule claims the group
   */
  public applyRules(
    pop: PopulationView,
    rules: readonly SimulationRule[],
    iter: number,
    t: number,
    mode: RuleMode = RuleMode.ITERATION,
    options: GroupSplitOptions = {},
  ): Group[] | null {
    let results: SplitSpecResult[];
    switch (mode) {
      case RuleMode.SETUP:
        results = rules.map((r) => r.setup?.(pop, this));
        break;
      case RuleMode.CLEANUP:
        results = rules.map((r) => r.cleanup?.(pop, this));
        break;
      default:
        results = rules
          .filter((r) => r.isApplicable(this, iter, t))
          .map((r) => r.apply(pop, this, iter, t));
    }

    const claims = collectClaims(results);
    if (claims.length === 0) {
      return null;
    }
    return this.split(orderByContent(combineSplitSpecs(claims)), options);
  }

  /**
   * Splits the group according to a simulation setup function.
   */
  public applySetupFn(
    pop: PopulationView,
    fn: GroupSetupFn,
    options: GroupSplitOptions = {},
  ): Group[] | null {
    const claims = collectClaims([fn(pop, this)]);
    if (claims.length === 0) {
      return null;
    }
    return this.split(orderByContent(combineSplitSpecs(claims)), options);
  }

  /**
   * Splits the group into new groups.
   *
   * Probabilities need not be complemented by the caller: the last spec
   * processed receives whatever probability and mass remain. Processing
   * stops as soon as the probabilities reach 1. Unless fractional mass is
   * allowed, masses are rounded so that their sum stays equal to the
   * group's mass. Specs that end up with no mass produce no group.
   */
  public split(
    specs: readonly GroupSplitSpec[],
    options: GroupSplitOptions = {},
  ): Group[] {
    const { fractionalMass = false, registry = null } = options;

    let pSum = 0;
    let mSum = 0;
    let masses: number[] = [];

    for (let i = 0; i < specs.length; i++) {
      const p = i === specs.length - 1 ? 1 - pSum : specs[i].p;
      const last = i === specs.length - 1 || pSum + p >= 1 - PROBABILITY_EPSILON;
      const m = last ? Math.max(0, this.mass - mSum) : this.mass * p;

      masses.push(m);
      pSum += p;
      mSum += m;
      if (last) break;
    }

    if (!fractionalMass) {
      masses = roundPreservingTotal(masses);
    }

    const groups: Group[] = [];
    masses.forEach((m, i) => {
      if (m === 0) return;
      const spec = specs[i];

      const relSet: RelMap = {};
      for (const [key, value] of Object.entries(spec.relSet)) {
        relSet[key] = value instanceof Resource && registry
          ? registry.registerEntity(value).getHash()
          : value;
      }

      groups.push(
        new Group(
          this.name,
          m,
          Group.genDict(this.attr, spec.attrSet, spec.attrDel),
          Group.genDict(this.rel, relSet, spec.relDel),
        ),
      );
    });
    return groups;
  }

  /**
   * Builds a new map from `base` with `set` applied and the `del` keys
   * removed.
   */
  public static genDict<V>(
    base: Readonly<Record<string, V>>,
    set: Readonly<Record<string, V>> = {},
    del: Iterable<string> = [],
  ): Record<string, V> {
    const out: Record<string, V> = { ...base, ...set };
    for (const key of del) {
      delete out[key];
    }
    return out;
  }

  /**
   * Standalone copy carrying the same content (entity relations stay as
   * they are stored, i.e., as hashes for a registered group).
   */
  public copy(): Group {
    return new Group(this.name, this.mass, this.attr, this.rel);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      mass: this.mass,
      hash: this.getHash(),
      attr: this.attr,
      rel: this.getRelRefs(),
    };
  }

  public toString(): string {
    return `Group  name: ${this.name}  mass: ${this.mass}  hash: ${this.getHash()}  attr: ${JSON.stringify(this.attr)}  rel: ${JSON.stringify(this.getRelRefs())}`;
  }
}
