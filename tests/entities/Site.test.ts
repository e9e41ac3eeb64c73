import { describe, it, expect } from "vitest";
import { Group } from "../../src/domain/simulation/entities/Group";
import { GroupQuery } from "../../src/domain/simulation/entities/GroupQuery";
import { Resource } from "../../src/domain/simulation/entities/Resource";
import { Site } from "../../src/domain/simulation/entities/Site";

describe("Site", () => {
  it("should be equal by content", () => {
    expect(new Site("a").equals(new Site("a"))).toBe(true);
    expect(new Site("a").equals(new Site("b"))).toBe(false);
    expect(new Site("a", { kind: "x" }).getHash()).not.toBe(
      new Site("a", { kind: "y" }).getHash(),
    );
    expect(new Site("a").equals(new Resource("a"))).toBe(false);
  });

  describe("group links", () => {
    const infected = new GroupQuery({ attr: { flu: "i" } });

    function setup() {
      const school = new Site("school", { kind: "primary" });
      const g1 = new Group("a", 30, { flu: "s" }, { [Site.AT]: school });
      const g2 = new Group("b", 10, { flu: "i" }, { [Site.AT]: school });
      school.addGroupLink(g1).addGroupLink(g2);
      return { school, g1, g2 };
    }

    it("should aggregate the mass of linked groups", () => {
      const { school, g2 } = setup();
      expect(school.getGroupCnt()).toBe(2);
      expect(school.getMass()).toBe(40);
      expect(school.getMass(infected)).toBe(10);
      expect(school.getMassProp(infected)).toBe(0.25);
      expect(school.getMassAndProp(infected)).toEqual([10, 0.25]);
      expect(school.getGroups(infected)).toEqual([g2]);
    });

    it("should filter out empty groups on request", () => {
      const { school, g1 } = setup();
      g1.mass = 0;
      school.invalidate();
      expect(school.getGroups(null, true)).toHaveLength(1);
      expect(school.getGroups()).toHaveLength(2);
    });

    it("should keep memoized masses until invalidated", () => {
      const { school, g2 } = setup();
      expect(school.getMass()).toBe(40);
      g2.mass = 20;
      expect(school.getMass()).toBe(40);
      school.invalidate();
      expect(school.getMass()).toBe(50);
    });

    it("should forget all groups on reset", () => {
      const { school } = setup();
      school.resetGroupLinks();
      expect(school.getGroupCnt()).toBe(0);
      expect(school.getMass()).toBe(0);
      expect(school.getMassProp(infected)).toBe(0);
    });
  });
});
