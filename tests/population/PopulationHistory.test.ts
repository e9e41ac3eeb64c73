import { describe, it, expect } from "vitest";
import {
  PopulationHistory,
  type PopulationHistoryEntry,
} from "../../src/domain/simulation/population/PopulationHistory";

function entry(mass: number): PopulationHistoryEntry {
  return { mass, massIn: 0, massOut: 0, groups: new Map([["g", mass]]) };
}

describe("PopulationHistory", () => {
  it("should return the most recent entry at delta 1", () => {
    const history = new PopulationHistory(3);
    history.push(entry(10));
    history.push(entry(20));

    expect(history.length).toBe(2);
    expect(history.get(1)?.mass).toBe(20);
    expect(history.get(2)?.mass).toBe(10);
    expect(history.get(3)).toBeUndefined();
    expect(history.get(0)).toBeUndefined();
  });

  it("should drop the oldest entry beyond capacity", () => {
    const history = new PopulationHistory(2);
    history.push(entry(1));
    history.push(entry(2));
    history.push(entry(3));

    expect(history.length).toBe(2);
    expect(history.get(2)?.mass).toBe(2);
  });

  it("should keep nothing with zero capacity", () => {
    const history = new PopulationHistory(0);
    history.push(entry(1));
    expect(history.length).toBe(0);
  });

  it("should clear entries", () => {
    const history = new PopulationHistory(2);
    history.push(entry(1));
    history.clear();
    expect(history.length).toBe(0);
  });
});
