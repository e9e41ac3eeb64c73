/* eslint-disable no-console */
import * as fs from "fs";
import * as path from "path";

/**
 * Logging utility for the simulation engine.
 *
 * Features:
 * - Console output with colored levels above a minimum level
 * - Memory buffer with optional periodic evacuation to JSON Lines files
 * - Category-based logging for subsystem identification
 * - Iteration context attached to every entry
 * - Aggregated metrics per level and category
 * - Throttling to prevent log spam from per-group messages
 */

import {
  LOG_LEVEL_SEVERITY,
  LogCategory,
  LogLevel,
} from "../../shared/constants/LogEnums";

/**
 * Log entry kept in memory and written to log files.
 */
export interface LogEntry {
  /** Unique identifier for this log entry */
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** ISO timestamp */
  timestamp: string;
  /** Unix timestamp for sorting/filtering */
  timestampMs: number;
  /** Simulation iteration current when the entry was created */
  iteration: number | null;
  /** Additional structured data */
  data?: unknown;
}

/**
 * Aggregated metrics for analysis.
 */
export interface LogMetrics {
  byLevel: Record<LogLevel, number>;
  byCategory: Record<LogCategory, number>;
  startTime: number;
  endTime: number;
  totalCount: number;
  /** Messages dropped by throttling */
  throttledCount: number;
}

/**
 * Filter options for log queries.
 */
export interface LogFilter {
  levels?: LogLevel[];
  categories?: LogCategory[];
  iteration?: number;
  /** Text search in message */
  messageContains?: string;
  /** Maximum results (most recent kept) */
  limit?: number;
}

export interface LoggerConfig {
  /** Entries below this level are kept in memory but not printed */
  minLevel: LogLevel;
  maxMemoryLogs: number;
  evacuationThreshold: number;
  /** Write buffered entries to JSON Lines files */
  toFile: boolean;
  logDir: string;
  writeIntervalMs: number;
  throttleWindowMs: number;
  maxThrottleCount: number;
}

const LOG_CATEGORIES: ReadonlySet<string> = new Set(Object.values(LogCategory));
const LOG_LEVELS: ReadonlySet<string> = new Set(Object.values(LogLevel));

export function isLogCategory(value: unknown): value is LogCategory {
  return typeof value === "string" && LOG_CATEGORIES.has(value);
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.has(value);
}

function readLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.toLowerCase();
  return isLogLevel(value) ? value : LogLevel.INFO;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  minLevel: readLogLevel(process.env.LOG_LEVEL),
  maxMemoryLogs: 5000,
  evacuationThreshold: Number(process.env.LOG_EVACUATION_THRESHOLD ?? 4000),
  toFile: process.env.LOG_TO_FILE === "true",
  logDir: process.env.LOG_DIR
    ? path.resolve(process.env.LOG_DIR)
    : path.join(process.cwd(), "logs"),
  writeIntervalMs: Number(process.env.LOG_WRITE_INTERVAL_MS ?? 5000),
  throttleWindowMs: Number(process.env.LOG_THROTTLE_WINDOW_MS ?? 5000),
  maxThrottleCount: Number(process.env.LOG_MAX_THROTTLE_COUNT ?? 3),
};

let logIdCounter = 0;

/**
 * Generate a unique ID for log entries. Does not draw from the seeded
 * random source so logging never perturbs a simulation.
 */
function generateLogId(): string {
  logIdCounter++;
  return `${Date.now()}-${logIdCounter.toString(36)}`;
}

function getDateString(): string {
  return new Date().toISOString().split("T")[0];
}

function initMetrics(): LogMetrics {
  const now = Date.now();
  return {
    byLevel: {
      [LogLevel.DEBUG]: 0,
      [LogLevel.INFO]: 0,
      [LogLevel.WARN]: 0,
      [LogLevel.ERROR]: 0,
    },
    byCategory: {
      [LogCategory.SIMULATION]: 0,
      [LogCategory.POPULATION]: 0,
      [LogCategory.RULES]: 0,
      [LogCategory.SITES]: 0,
      [LogCategory.ANALYSIS]: 0,
      [LogCategory.CONFIG]: 0,
      [LogCategory.GENERAL]: 0,
    },
    startTime: now,
    endTime: now,
    totalCount: 0,
    throttledCount: 0,
  };
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "\x1b[36m",
  [LogLevel.INFO]: "\x1b[32m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

/**
 * Logger with memory buffering, optional file evacuation and query support.
 * Console: levels at or above `minLevel`, with colors
 * Memory: all levels with full metadata
 * Files: one JSON Lines file per day (opt-in)
 */
export class Logger {
  private config: LoggerConfig;
  private memoryBuffer: LogEntry[] = [];
  private throttleMap = new Map<string, { count: number; lastTime: number }>();
  private isEvacuating = false;
  private evacuationInterval?: NodeJS.Timeout;
  private evacuationPromise: Promise<void> = Promise.resolve();
  private metrics: LogMetrics = initMetrics();
  private currentIteration: number | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };

    if (this.config.toFile) {
      this.ensureLogDir();
      this.evacuationInterval = setInterval(
        () => this.checkEvacuation(),
        this.config.writeIntervalMs,
      );
      this.evacuationInterval.unref();
    }
  }

  private ensureLogDir(): void {
    try {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    } catch (error) {
      console.warn(
        `Failed to create log directory ${this.config.logDir}:`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  getLogFilePath(): string {
    return path.join(this.config.logDir, `logs-${getDateString()}.jsonl`);
  }

  private formatConsoleMessage(
    level: LogLevel,
    category: LogCategory,
    message: string,
  ): string {
    const reset = "\x1b[0m";
    const iter =
      this.currentIteration === null ? "" : ` [iter ${this.currentIteration}]`;
    return `${LEVEL_COLORS[level]}[${new Date().toISOString()}] [${level.toUpperCase()}] [${category}]${iter}${reset} ${message}`;
  }

  private shouldThrottle(message: string): boolean {
    const now = Date.now();
    const key = message.substring(0, 100);
    const entry = this.throttleMap.get(key);

    if (!entry) {
      this.throttleMap.set(key, { count: 1, lastTime: now });
      return false;
    }

    if (now - entry.lastTime > this.config.throttleWindowMs) {
      entry.count = 1;
      entry.lastTime = now;
      return false;
    }

    entry.count++;
    return entry.count > this.config.maxThrottleCount;
  }

  private addToMemory(entry: LogEntry): void {
    this.memoryBuffer.push(entry);
    this.metrics.byLevel[entry.level]++;
    this.metrics.byCategory[entry.category]++;
    this.metrics.endTime = entry.timestampMs;
    this.metrics.totalCount++;

    if (!this.config.toFile) {
      if (this.memoryBuffer.length > this.config.maxMemoryLogs) {
        this.memoryBuffer.splice(
          0,
          this.memoryBuffer.length - this.config.maxMemoryLogs,
        );
      }
    } else if (this.memoryBuffer.length >= this.config.evacuationThreshold) {
      this.evacuateToFile();
    }
  }

  private evacuateToFile(): void {
    this.evacuationPromise = this.evacuationPromise.then(() =>
      this.doEvacuate(),
    );
  }

  private async doEvacuate(): Promise<void> {
    if (!this.config.toFile || this.isEvacuating) return;
    if (this.memoryBuffer.length === 0) return;

    this.isEvacuating = true;
    const logsToWrite = [...this.memoryBuffer];
    this.memoryBuffer = [];
    const logFilePath = this.getLogFilePath();

    try {
      const lines = logsToWrite.map((log) => JSON.stringify(log)).join("\n");
      await fs.promises.appendFile(logFilePath, lines + "\n", "utf-8");
    } catch (error) {
      this.memoryBuffer = [...logsToWrite, ...this.memoryBuffer].slice(
        0,
        this.config.maxMemoryLogs,
      );
      console.error("Failed to evacuate logs:", {
        error: error instanceof Error ? error.message : String(error),
        bufferSize: logsToWrite.length,
        filePath: logFilePath,
      });
    } finally {
      this.isEvacuating = false;
    }
  }

  private checkEvacuation(): void {
    if (this.memoryBuffer.length > 0) {
      this.evacuateToFile();
    }

    const now = Date.now();
    for (const [key, entry] of this.throttleMap) {
      if (now - entry.lastTime > this.config.throttleWindowMs * 2) {
        this.throttleMap.delete(key);
      }
    }
  }

  /**
   * Set the current simulation iteration for log context. `null` clears it.
   */
  setIteration(iteration: number | null): void {
    this.currentIteration = iteration;
  }

  setMinLevel(level: LogLevel): void {
    this.config.minLevel = level;
  }

  /**
   * Log with explicit category.
   */
  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    data?: unknown,
  ): void {
    if (this.shouldThrottle(message)) {
      this.metrics.throttledCount++;
      return;
    }

    const now = Date.now();
    this.addToMemory({
      id: generateLogId(),
      level,
      category,
      message,
      timestamp: new Date(now).toISOString(),
      timestampMs: now,
      iteration: this.currentIteration,
      data,
    });

    if (LOG_LEVEL_SEVERITY[level] < LOG_LEVEL_SEVERITY[this.config.minLevel]) {
      return;
    }

    const consoleMsg = this.formatConsoleMessage(level, category, message);
    switch (level) {
      case LogLevel.DEBUG:
        console.log(consoleMsg, data ?? "");
        break;
      case LogLevel.INFO:
        console.info(consoleMsg, data ?? "");
        break;
      case LogLevel.WARN:
        console.warn(consoleMsg, data ?? "");
        break;
      case LogLevel.ERROR:
        console.error(consoleMsg, data ?? "");
        break;
    }
  }

  private dispatch(
    level: LogLevel,
    message: string,
    categoryOrData: unknown,
    data: unknown,
  ): void {
    if (isLogCategory(categoryOrData)) {
      this.log(level, categoryOrData, message, data);
    } else {
      this.log(level, LogCategory.GENERAL, message, categoryOrData);
    }
  }

  debug(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.DEBUG, message, categoryOrData, data);
  }

  info(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.INFO, message, categoryOrData, data);
  }

  warn(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.WARN, message, categoryOrData, data);
  }

  error(message: string, categoryOrData?: unknown, data?: unknown): void {
    this.dispatch(LogLevel.ERROR, message, categoryOrData, data);
  }

  getMetrics(): LogMetrics {
    return {
      ...this.metrics,
      byLevel: { ...this.metrics.byLevel },
      byCategory: { ...this.metrics.byCategory },
    };
  }

  resetMetrics(): void {
    this.metrics = initMetrics();
  }

  /**
   * Query logs from memory buffer with filters.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const { levels, categories, iteration, messageContains, limit } = filter;
    let results = [...this.memoryBuffer];

    if (levels?.length) {
      results = results.filter((e) => levels.includes(e.level));
    }
    if (categories?.length) {
      results = results.filter((e) => categories.includes(e.category));
    }
    if (iteration !== undefined) {
      results = results.filter((e) => e.iteration === iteration);
    }
    if (messageContains) {
      const search = messageContains.toLowerCase();
      results = results.filter((e) => e.message.toLowerCase().includes(search));
    }
    if (limit) {
      results = results.slice(-limit);
    }

    return results;
  }

  /**
   * Force immediate evacuation of logs to file.
   */
  async flush(): Promise<void> {
    await this.evacuationPromise;
    await this.doEvacuate();
  }

  getBufferSize(): number {
    return this.memoryBuffer.length;
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.memoryBuffer.slice(-count);
  }

  /**
   * Drops buffered entries and throttling state.
   */
  clear(): void {
    this.memoryBuffer = [];
    this.throttleMap.clear();
  }

  destroy(): void {
    if (this.evacuationInterval) {
      clearInterval(this.evacuationInterval);
    }
  }
}

export const logger = new Logger();

export { LogLevel, LogCategory } from "../../shared/constants/LogEnums";
