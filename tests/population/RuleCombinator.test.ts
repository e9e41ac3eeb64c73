import { describe, it, expect } from "vitest";
import { Group } from "../../src/domain/simulation/entities/Group";
import { GroupSplitSpec } from "../../src/domain/simulation/entities/GroupSplitSpec";
import {
  collectClaims,
  combineSplitSpecs,
  normalizeSplitSpecs,
  orderByContent,
} from "../../src/domain/simulation/population/RuleCombinator";
import { GroupPopulation } from "../../src/domain/simulation/population/GroupPopulation";
import { Rule } from "../../src/domain/simulation/rules/Rule";
import { createSimulationConfig } from "../../src/config/config";
import type { SplitSpecResult } from "../../src/shared/types/simulation/rules";

const spec = (p: number, attrSet: Record<string, number> = {}) =>
  new GroupSplitSpec({ p, attrSet });

class FixedRule extends Rule {
  constructor(
    name: string,
    private readonly specs: GroupSplitSpec[],
  ) {
    super(name);
  }

  apply(): SplitSpecResult {
    return this.specs;
  }
}

describe("RuleCombinator", () => {
  it("should multiply probabilities across rules", () => {
    const combined = combineSplitSpecs([
      [spec(0.5, { a: 1 }), spec(0.5, { a: 2 })],
      [spec(0.25, { b: 1 }), spec(0.75, { b: 2 })],
    ]);

    expect(combined.map((s) => s.p)).toEqual([0.125, 0.375, 0.125, 0.375]);
    expect(combined.map((s) => s.attrSet)).toEqual([
      { a: 1, b: 1 },
      { a: 1, b: 2 },
      { a: 2, b: 1 },
      { a: 2, b: 2 },
    ]);
  });

  it("should let a later rule overwrite a set value and union deletions", () => {
    const [combined] = combineSplitSpecs([
      [new GroupSplitSpec({ p: 1, attrSet: { a: 1 }, attrDel: ["x"] })],
      [new GroupSplitSpec({ p: 1, attrSet: { a: 2 }, attrDel: ["y"], relDel: ["home"] })],
    ]);

    expect(combined.attrSet).toEqual({ a: 2 });
    expect([...combined.attrDel].sort()).toEqual(["x", "y"]);
    expect([...combined.relDel]).toEqual(["home"]);
  });

  it("should drop results that make no claim", () => {
    const claims = collectClaims([null, undefined, [], [spec(1)]]);
    expect(claims).toHaveLength(1);
    expect(claims[0][0].p).toBe(1);
  });

  it("should give trailing specs of each rule their complement", () => {
    expect(normalizeSplitSpecs([spec(0.2, { a: 1 }), spec(0)]).map((s) => s.p)).toEqual([
      0.2, 0.8,
    ]);

    const capped = normalizeSplitSpecs([spec(0.7, { a: 1 }), spec(0.7, { a: 2 }), spec(0.2)]);
    expect(capped).toHaveLength(2);
    expect(capped[1].attrSet).toEqual({ a: 2 });
    expect(capped[1].p).toBeCloseTo(0.3, 12);

    const combined = combineSplitSpecs([
      [spec(0.5, { a: 1 }), spec(0)],
      [spec(0.5, { b: 1 }), spec(0)],
    ]);
    expect(combined.map((s) => s.p)).toEqual([0.25, 0.25, 0.25, 0.25]);
  });

  it("should order specs by content regardless of probability and input order", () => {
    const x = spec(0.1, { a: 1, b: 2 });
    const y = spec(0.9, { c: 3 });
    const sameAsX = new GroupSplitSpec({ p: 0.5, attrSet: { b: 2, a: 1 } });

    expect(sameAsX.getHash()).toBe(x.getHash());
    expect(orderByContent([x, y]).map((s) => s.attrSet)).toEqual(
      orderByContent([y, x]).map((s) => s.attrSet),
    );
  });

  it("should not depend on rule order when masses are rounded", () => {
    const first = new FixedRule("first", [spec(0.5, { a: 1 }), spec(0.5, { a: 2 })]);
    const second = new FixedRule("second", [spec(0.5, { b: 1 }), spec(0.5, { b: 2 })]);

    const masses = (rules: Rule[]): Map<string, number> => {
      const pop = new GroupPopulation(createSimulationConfig({ historyLength: 0 }));
      const groups = new Group("g", 2).applyRules(pop, rules, 0, 0);
      return new Map((groups ?? []).map((g) => [g.getHash(), g.mass]));
    };

    const forward = masses([first, second]);
    const backward = masses([second, first]);

    expect(forward.size).toBe(2);
    expect([...forward.values()]).toEqual([1, 1]);
    expect(backward).toEqual(forward);
  });

  it("should not depend on the order of independent rules", () => {
    const flu = new FixedRule("flu", [spec(0.5, { a: 1 }), spec(0.5, { a: 2 })]);
    const move = new FixedRule("move", [spec(0.25, { b: 1 }), spec(0.75, { b: 2 })]);

    const masses = (rules: Rule[]): Map<string, number> => {
      const pop = new GroupPopulation(
        createSimulationConfig({ fractionalMass: true, historyLength: 0 }),
      );
      const groups = new Group("g", 100).applyRules(pop, rules, 0, 0, undefined, {
        fractionalMass: true,
      });
      return new Map((groups ?? []).map((g) => [g.getHash(), g.mass]));
    };

    const forward = masses([flu, move]);
    const backward = masses([move, flu]);

    expect(forward.size).toBe(4);
    expect(backward).toEqual(forward);
    expect(forward.get(new Group(null, 0, { a: 1, b: 2 }).getHash())).toBe(37.5);
  });
});
