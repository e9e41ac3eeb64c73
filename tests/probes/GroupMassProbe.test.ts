import { describe, it, expect } from "vitest";
import { Group } from "../../src/domain/simulation/entities/Group";
import { GroupQuery } from "../../src/domain/simulation/entities/GroupQuery";
import { GroupPopulation } from "../../src/domain/simulation/population/GroupPopulation";
import { GroupMassProbe } from "../../src/domain/simulation/probes/GroupMassProbe";
import { createSimulationConfig } from "../../src/config/config";
import { logger, LogLevel } from "../../src/infrastructure/utils/logger";

function newPopulation(): GroupPopulation {
  const pop = new GroupPopulation(createSimulationConfig());
  pop.addGroup(new Group("s", 30, { flu: "s" }));
  pop.addGroup(new Group("i", 10, { flu: "i" }));
  return pop;
}

const series = [
  { name: "s", qry: new GroupQuery({ attr: { flu: "s" } }) },
  { name: "all", qry: null },
];

describe("GroupMassProbe", () => {
  it("should record masses per series", () => {
    const probe = new GroupMassProbe("flu", series);
    probe.setPopulation(newPopulation());

    probe.run(null, null);
    probe.run(0, 6);

    expect(probe.getRows()).toEqual([
      { iter: null, t: null, values: { s: 30, all: 40 } },
      { iter: 0, t: 6, values: { s: 30, all: 40 } },
    ]);
    expect(probe.getSeries("s")).toEqual([30, 30]);
  });

  it("should record proportions when asked to", () => {
    const probe = new GroupMassProbe("flu", series, { asProportion: true });
    probe.setPopulation(newPopulation());
    probe.run(0, 0);

    expect(probe.getRows()[0].values).toEqual({ s: 0.75, all: 1 });
  });

  it("should warn and record nothing without a population", () => {
    const probe = new GroupMassProbe("orphan", series);
    probe.run(0, 0);

    expect(probe.getRows()).toHaveLength(0);
    const warnings = logger.queryLogs({ levels: [LogLevel.WARN] });
    expect(warnings.map((e) => e.message)).toEqual(["Probe 'orphan' has no population"]);
  });

  it("should clear recorded rows", () => {
    const probe = new GroupMassProbe("flu", series);
    probe.setPopulation(newPopulation());
    probe.run(0, 0);
    probe.clear();

    expect(probe.getRows()).toHaveLength(0);
  });
});
