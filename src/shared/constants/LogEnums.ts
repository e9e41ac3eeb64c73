/**
 * Log level enumerations for the simulation engine.
 *
 * @module shared/constants/LogEnums
 */

/**
 * Enumeration of log levels, ordered from least to most severe.
 */
export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

/**
 * Enumeration of log categories for identifying which component generated the log.
 * Useful for filtering and analyzing behavior by subsystem.
 */
export enum LogCategory {
  /** Simulation runner, timer and pragmas */
  SIMULATION = "simulation",
  /** Group registry, mass transfer and VOID/VITA lifecycle */
  POPULATION = "population",
  /** Rule application and split combination */
  RULES = "rules",
  /** Site membership and resource capacity */
  SITES = "sites",
  /** Attribute-usage analysis */
  ANALYSIS = "analysis",
  /** Environment configuration */
  CONFIG = "config",
  /** General/uncategorized logs */
  GENERAL = "general",
}

/**
 * Numeric severity used to filter console output.
 */
export const LOG_LEVEL_SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};
