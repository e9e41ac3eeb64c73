import { EntityType } from "@/shared/constants/EntityEnums";
import type { AttrMap, AttrValue } from "@/shared/types/simulation/entities";
import { fsum } from "@/shared/utils/mathUtils";
import { canonicalEntries, digest } from "./ContentHash";
import { Resource } from "./Resource";
import type { Group } from "./Group";
import type { GroupQuery } from "./GroupQuery";

/**
 * A physical site (e.g., a school or a store) agents can reside at.
 *
 * A site knows which groups are currently located at it (groups holding it
 * under its `relName`, `@` by default) so it can answer questions about the size and composition of the
 * population there. Those answers are computed lazily and memoized until the
 * population relinks its groups after a mass transfer.
 *
 * Being a Resource, a site may also use capacity (e.g., a hospital with a
 * limited number of beds).
 */
export class Site extends Resource {
  /** Relation name under which a group records the site it is currently at. */
  public static readonly AT = "@";

  public readonly attr: Readonly<AttrMap>;
  public readonly relName: string;

  private groups = new Set<Group>();
  private groupsCache = new Map<string, Group[]>();
  private massCache = new Map<string, number>();

  constructor(
    name: string,
    attr: AttrMap = {},
    relName: string = Site.AT,
    capacityMax: number = 1,
  ) {
    super(name, capacityMax);
    this.attr = { ...attr };
    this.relName = relName;
  }

  public override get type(): EntityType {
    return EntityType.SITE;
  }

  public override getHash(): string {
    if (this.hash === null) {
      this.hash = digest([
        EntityType.SITE,
        this.name,
        this.relName,
        canonicalEntries(this.attr),
      ]);
    }
    return this.hash;
  }

  /**
   * Links a group located at this site.
   */
  public addGroupLink(group: Group): this {
    this.groups.add(group);
    return this.invalidate();
  }

  /**
   * Unlinks all groups and drops memoized query results.
   */
  public resetGroupLinks(): this {
    this.groups = new Set();
    return this.invalidate();
  }

  /**
   * Drops memoized query results. Called when the mass of a linked group
   * changes.
   */
  public invalidate(): this {
    this.groupsCache.clear();
    this.massCache.clear();
    return this;
  }

  public getAttr(name: string): AttrValue | undefined {
    return this.attr[name];
  }

  /**
   * Groups currently at this site, optionally restricted by a query.
   */
  public getGroups(
    qry: GroupQuery | null = null,
    nonEmptyOnly: boolean = false,
  ): readonly Group[] {
    const key = `${qry ? qry.getHash() : "*"}|${nonEmptyOnly ? 1 : 0}`;
    let groups = this.groupsCache.get(key);
    if (groups === undefined) {
      groups = [...this.groups].filter(
        (g) => (!qry || qry.matches(g)) && (!nonEmptyOnly || g.mass > 0),
      );
      this.groupsCache.set(key, groups);
    }
    return groups;
  }

  /**
   * Mass of the groups at this site that match the query.
   */
  public getMass(qry: GroupQuery | null = null): number {
    const key = qry ? qry.getHash() : "*";
    let m = this.massCache.get(key);
    if (m === undefined) {
      m = fsum(this.getGroups(qry).map((g) => g.mass));
      this.massCache.set(key, m);
    }
    return m;
  }

  /**
   * Proportion of the site's mass accounted for by groups matching the query.
   */
  public getMassProp(qry: GroupQuery | null = null): number {
    return this.getMassAndProp(qry)[1];
  }

  public getMassAndProp(qry: GroupQuery | null = null): [number, number] {
    const total = this.getMass();
    const m = this.getMass(qry);
    return [m, total > 0 ? m / total : 0];
  }

  public getGroupCnt(): number {
    return this.groups.size;
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attr: this.attr,
      relName: this.relName,
      mass: this.getMass(),
    };
  }

  public override toString(): string {
    return `Site  name: ${this.name}  hash: ${this.getHash()}  attr: ${JSON.stringify(this.attr)}`;
  }
}
