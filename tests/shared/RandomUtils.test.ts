import { describe, it, expect } from "vitest";
import { RandomUtils } from "../../src/shared/utils/RandomUtils";

describe("RandomUtils", () => {
  it("should replay the same sequence for the same seed", () => {
    RandomUtils.seed(1928);
    const first = [RandomUtils.float(), RandomUtils.float(), RandomUtils.float()];
    RandomUtils.seed(1928);
    const second = [RandomUtils.float(), RandomUtils.float(), RandomUtils.float()];

    expect(second).toEqual(first);
  });

  it("should stay within integer bounds", () => {
    RandomUtils.seed(7);
    for (let i = 0; i < 100; i++) {
      const v = RandomUtils.intRange(2, 4);
      expect(v).toBeGreaterThanOrEqual(2);
      expect(v).toBeLessThanOrEqual(4);
      expect(Number.isInteger(v)).toBe(true);
    }
  });

  it("should honour certain and impossible chances", () => {
    expect(RandomUtils.chance(1)).toBe(true);
    expect(RandomUtils.chance(0)).toBe(false);
  });

  it("should return undefined for an empty array", () => {
    expect(RandomUtils.element([])).toBeUndefined();
    expect(RandomUtils.element(["only"])).toBe("only");
  });
});
