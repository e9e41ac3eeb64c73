import { describe, it, expect, beforeEach, vi } from "vitest";
import { createContainer } from "../../src/config/container";
import { TYPES } from "../../src/config/Types";
import type { SimulationConfig } from "../../src/config/config";
import { SimulationRunner } from "../../src/domain/simulation/core/SimulationRunner";
import { Group } from "../../src/domain/simulation/entities/Group";
import { GroupQuery } from "../../src/domain/simulation/entities/GroupQuery";
import { GroupSplitSpec } from "../../src/domain/simulation/entities/GroupSplitSpec";
import { SimulationConstructionError } from "../../src/domain/simulation/errors";
import { GroupMassProbe } from "../../src/domain/simulation/probes/GroupMassProbe";
import { Rule } from "../../src/domain/simulation/rules/Rule";
import { logger, LogLevel } from "../../src/infrastructure/utils/logger";
import { SimulationEventType } from "../../src/shared/constants/SimulationEnums";
import type { PopulationView, SplitSpecResult } from "../../src/shared/types/simulation/rules";
import { RandomUtils } from "../../src/shared/utils/RandomUtils";

/** Moves half of the susceptible mass to the infected state. */
class HalfInfectionRule extends Rule {
  constructor() {
    super("half-infection");
  }

  isApplicable(group: Group): boolean {
    return group.getAttr("flu") === "s";
  }

  apply(): SplitSpecResult {
    return [
      new GroupSplitSpec({ p: 0.5, attrSet: { flu: "i" } }),
      new GroupSplitSpec(),
    ];
  }
}

class FailingRule extends Rule {
  constructor() {
    super("failing");
  }

  apply(): SplitSpecResult {
    throw new Error("rule failed");
  }
}

function newRunner(overrides: Partial<SimulationConfig> = {}): SimulationRunner {
  return createContainer({
    randSeed: null,
    timeMin: 0,
    timeMax: 24,
    analyze: false,
    autocompact: false,
    fractionalMass: false,
    ...overrides,
  }).get<SimulationRunner>(TYPES.SimulationRunner);
}

const susceptible = new GroupQuery({ attr: { flu: "s" } });
const infected = new GroupQuery({ attr: { flu: "i" } });

describe("SimulationRunner", () => {
  let runner: SimulationRunner;

  beforeEach(() => {
    runner = newRunner();
  });

  describe("assembly", () => {
    it("should share the population bound in the container", () => {
      const container = createContainer();
      const r = container.get<SimulationRunner>(TYPES.SimulationRunner);
      expect(r.getPopulation()).toBe(container.get(TYPES.GroupPopulation));
    });

    it("should refuse groups before rules", () => {
      expect(() => runner.addGroup(new Group("s", 1))).toThrow(SimulationConstructionError);
    });

    it("should refuse rules after groups", () => {
      runner.addRule(new HalfInfectionRule()).addGroup(new Group("s", 1, { flu: "s" }));
      expect(() => runner.addRule(new HalfInfectionRule())).toThrow(
        "Rules must be added before groups; the population already has groups.",
      );
    });

    it("should warn and do nothing without rules", () => {
      runner.run(5);

      expect(runner.getRunCnt()).toBe(0);
      expect(logger.queryLogs({ levels: [LogLevel.WARN] }).map((e) => e.message)).toEqual([
        "No rules are present; nothing to run",
      ]);
    });

    it("should warn and do nothing without groups", () => {
      runner.addRule(new HalfInfectionRule()).run(5);

      expect(runner.getRunCnt()).toBe(0);
      expect(logger.queryLogs({ levels: [LogLevel.WARN] }).map((e) => e.message)).toEqual([
        "No groups are present; nothing to run",
      ]);
    });

    it("should reject invalid iteration counts", () => {
      expect(() => runner.run(-1)).toThrow(RangeError);
      expect(() => runner.run(1.5)).toThrow(RangeError);
    });

    it("should propagate the fractional mass pragma to the population", () => {
      runner.setPragma("fractionalMass", true);
      expect(runner.getPragma("fractionalMass")).toBe(true);
      expect(runner.getPopulation().isFractionalMass()).toBe(true);
    });
  });

  describe("run", () => {
    let probe: GroupMassProbe;

    beforeEach(() => {
      probe = new GroupMassProbe("flu", [
        { name: "s", qry: susceptible },
        { name: "i", qry: infected },
      ]);
      runner
        .addRule(new HalfInfectionRule())
        .addGroup(new Group("g", 16, { flu: "s" }))
        .addProbe(probe);
    });

    it("should run iterations and record probe rows", () => {
      runner.run(3);

      expect(probe.getRows()).toEqual([
        { iter: null, t: null, values: { s: 16, i: 0 } },
        { iter: 0, t: 0, values: { s: 8, i: 8 } },
        { iter: 1, t: 1, values: { s: 4, i: 12 } },
        { iter: 2, t: 2, values: { s: 2, i: 14 } },
      ]);
      expect(runner.getTimer().getI()).toBe(3);
      expect(runner.getRunCnt()).toBe(1);
      expect(runner.isRunning()).toBe(false);
    });

    it("should continue where the previous run stopped", () => {
      runner.run(3).run(1);

      expect(probe.getRows()).toHaveLength(5);
      expect(probe.getRows()[4]).toEqual({ iter: 3, t: 3, values: { s: 1, i: 15 } });
      expect(runner.getRunCnt()).toBe(2);
    });

    it("should emit lifecycle events", () => {
      const iterations: number[] = [];
      const onStart = vi.fn();
      const onEnd = vi.fn();
      runner
        .on(SimulationEventType.RUN_START, onStart)
        .on(SimulationEventType.ITERATION, (e) => iterations.push(e.massFlow))
        .on(SimulationEventType.RUN_END, onEnd);

      runner.run(3);

      expect(onStart).toHaveBeenCalledWith({
        runCnt: 1,
        iterations: 3,
        mass: 16,
        groupCnt: 1,
        siteCnt: 0,
      });
      expect(iterations).toEqual([8, 4, 2]);
      expect(onEnd).toHaveBeenCalledWith({
        runCnt: 1,
        iterations: 3,
        mass: 16,
        groupCnt: 2,
        usage: null,
      });
    });

    it("should stop listeners removed with off", () => {
      const listener = vi.fn();
      runner.on(SimulationEventType.ITERATION, listener);
      runner.off(SimulationEventType.ITERATION, listener);
      runner.run(2);

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("autostop", () => {
    it("should stop once mass flow stays low", () => {
      const onAutostop = vi.fn();
      runner
        .addRule(new HalfInfectionRule())
        .addGroup(new Group("r", 10, { flu: "r" }))
        .setPragma("autostop", true)
        .setPragma("autostopP", 0.01)
        .setPragma("autostopT", 2)
        .on(SimulationEventType.AUTOSTOP, onAutostop);

      runner.run(10);

      expect(onAutostop).toHaveBeenCalledTimes(1);
      expect(onAutostop).toHaveBeenCalledWith({ iter: 1, massFlow: 0, massFlowProp: 0 });
      expect(runner.getTimer().getI()).toBe(2);
      expect(runner.getTimer().getILeft()).toBe(0);
    });
  });

  describe("setup", () => {
    it("should pass every group through the group setup function once", () => {
      runner
        .addRule(new HalfInfectionRule())
        .addGroup(new Group("g", 16, { flu: "s" }))
        .setGroupSetup((_pop: PopulationView, group: Group) =>
          group.getAttr("flu") === "s"
            ? [
                new GroupSplitSpec({ p: 0.25, attrSet: { age: "old" } }),
                new GroupSplitSpec(),
              ]
            : null,
        );

      runner.run(0);

      const pop = runner.getPopulation();
      expect(pop.getGroup({ flu: "s", age: "old" })?.mass).toBe(4);
      expect(pop.getGroup({ flu: "s" })?.mass).toBe(12);
    });
  });

  describe("analysis", () => {
    it("should report attributes no rule conditioned on", () => {
      runner = newRunner({ analyze: true });
      runner
        .addRule(new HalfInfectionRule())
        .addGroup(new Group("g", 16, { flu: "s", sex: "f" }))
        .run(2);

      expect(runner.getUsageReport()).toEqual({
        attrUsed: ["flu"],
        relUsed: [],
        attrUnused: ["sex"],
        relUnused: [],
      });
      expect(runner.getPopulation().usageObserver).toBeNull();
    });
  });

  describe("seeding", () => {
    it("should seed the shared random source on the first run", () => {
      RandomUtils.seed(7);
      const expected = RandomUtils.float();
      RandomUtils.seed(null);

      runner = newRunner({ randSeed: 7 });
      runner
        .addRule(new HalfInfectionRule())
        .addGroup(new Group("g", 16, { flu: "s" }))
        .run(1);

      expect(RandomUtils.float()).toBe(expected);
    });
  });

  describe("errors", () => {
    it("should log and rethrow errors raised by rules", () => {
      runner.addRule(new FailingRule()).addGroup(new Group("g", 1));

      expect(() => runner.run(1)).toThrow("rule failed");
      expect(runner.isRunning()).toBe(false);
      const errors = logger.queryLogs({ levels: [LogLevel.ERROR] });
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe("Simulation run aborted");
      expect(errors[0].data).toEqual({ iter: 0, error: "rule failed" });
    });
  });
});
