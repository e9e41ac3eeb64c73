import { describe, it, expect, afterEach, vi } from "vitest";
import {
  Logger,
  LogCategory,
  LogLevel,
  isLogCategory,
} from "../../src/infrastructure/utils/logger";

function newLogger(): Logger {
  return new Logger({
    minLevel: LogLevel.ERROR,
    toFile: false,
    maxThrottleCount: 3,
    throttleWindowMs: 60_000,
  });
}

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should route a category argument and data", () => {
    const log = newLogger();
    log.info("Rule added", LogCategory.RULES, { name: "flu" });
    log.warn("Loose message", { n: 1 });

    const [first, second] = log.getRecentLogs();
    expect(first.category).toBe(LogCategory.RULES);
    expect(first.data).toEqual({ name: "flu" });
    expect(second.category).toBe(LogCategory.GENERAL);
    expect(second.data).toEqual({ n: 1 });
  });

  it("should throttle repeated messages", () => {
    const log = newLogger();
    for (let k = 0; k < 5; k++) {
      log.debug("same message");
    }

    expect(log.getBufferSize()).toBe(3);
    expect(log.getMetrics().throttledCount).toBe(2);
  });

  it("should attach the current iteration to entries", () => {
    const log = newLogger();
    log.setIteration(4);
    log.info("inside", LogCategory.SIMULATION);
    log.setIteration(null);
    log.info("outside", LogCategory.SIMULATION);

    expect(log.queryLogs({ iteration: 4 }).map((e) => e.message)).toEqual(["inside"]);
    expect(log.getRecentLogs(1)[0].iteration).toBeNull();
  });

  it("should filter by level, category and text", () => {
    const log = newLogger();
    log.debug("Mass transferred: 5", LogCategory.POPULATION);
    log.info("Running rule setup", LogCategory.SIMULATION);
    log.warn("No groups are present", LogCategory.SIMULATION);

    expect(log.queryLogs({ levels: [LogLevel.WARN] })).toHaveLength(1);
    expect(log.queryLogs({ categories: [LogCategory.SIMULATION] })).toHaveLength(2);
    expect(log.queryLogs({ messageContains: "mass" })).toHaveLength(1);
    expect(log.queryLogs({ limit: 1 })[0].message).toBe("No groups are present");
  });

  it("should count entries per level and category", () => {
    const log = newLogger();
    log.info("a", LogCategory.SITES);
    log.info("b", LogCategory.SITES);

    const metrics = log.getMetrics();
    expect(metrics.totalCount).toBe(2);
    expect(metrics.byLevel[LogLevel.INFO]).toBe(2);
    expect(metrics.byCategory[LogCategory.SITES]).toBe(2);

    log.resetMetrics();
    expect(log.getMetrics().totalCount).toBe(0);
  });

  it("should print only entries at or above the minimum level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = newLogger();

    log.info("quiet", LogCategory.GENERAL);
    log.error("loud", LogCategory.GENERAL);

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(log.getBufferSize()).toBe(2);
  });

  it("should cap the memory buffer", () => {
    const log = new Logger({ toFile: false, maxMemoryLogs: 2, minLevel: LogLevel.ERROR });
    log.info("one");
    log.info("two");
    log.info("three");

    expect(log.getRecentLogs().map((e) => e.message)).toEqual(["two", "three"]);
  });

  it("should recognize categories", () => {
    expect(isLogCategory("rules")).toBe(true);
    expect(isLogCategory("world")).toBe(false);
  });
});
