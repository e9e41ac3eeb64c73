/**
 * Engine configuration loaded from environment variables.
 *
 * Every variable is optional. Values that are present but malformed abort
 * start-up instead of silently falling back to defaults.
 *
 * @module config
 */

/**
 * Settings a population and its runner are created with.
 */
export interface SimulationConfig {
  /** Seed of the shared random source; null leaves it unseeded. */
  randSeed: number | null;
  /** Keep split masses fractional instead of rounding them to integers. */
  fractionalMass: boolean;
  /** Remove empty groups after every iteration. */
  autocompact: boolean;
  /** Number of post-transfer population snapshots retained. */
  historyLength: number;
  /** Keep the full source/destination record of the last mass transfer. */
  keepMassFlowSpecs: boolean;
  /** Track attribute usage during runs and report unused attributes. */
  analyze: boolean;
  /** Time of the first iteration. */
  timeMin: number;
  /** Length of the time cycle. */
  timeMax: number;
}

function readInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  }
  return value;
}

function readBool(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: boolean,
): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  throw new Error(`Invalid ${name}: expected "true" or "false", got "${raw}"`);
}

/**
 * Reads the configuration from an environment map.
 *
 * @throws Error when a variable is present but malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const randSeed = env.SIM_RAND_SEED;
  return {
    RAND_SEED:
      randSeed === undefined || randSeed.trim() === ""
        ? null
        : readInt(env, "SIM_RAND_SEED", 0),
    FRACTIONAL_MASS: readBool(env, "SIM_FRACTIONAL_MASS", false),
    AUTOCOMPACT: readBool(env, "SIM_AUTOCOMPACT", false),
    HISTORY_LENGTH: readInt(env, "SIM_HISTORY_LENGTH", 0),
    KEEP_MASS_FLOW_SPECS: readBool(env, "SIM_KEEP_MASS_FLOW_SPECS", false),
    ANALYZE: readBool(env, "SIM_ANALYZE", false),
    TIME_MIN: readInt(env, "SIM_TIME_MIN", 0),
    TIME_MAX: readInt(env, "SIM_TIME_MAX", 2 ** 31 - 1),
  };
}

/**
 * Engine configuration object.
 *
 * @property {number|null} RAND_SEED - Seed of the shared random source (SIM_RAND_SEED)
 * @property {boolean} FRACTIONAL_MASS - Allow fractional group masses (SIM_FRACTIONAL_MASS)
 * @property {boolean} AUTOCOMPACT - Drop empty groups every iteration (SIM_AUTOCOMPACT)
 * @property {number} HISTORY_LENGTH - Population snapshots retained (SIM_HISTORY_LENGTH)
 * @property {boolean} KEEP_MASS_FLOW_SPECS - Keep last transfer details (SIM_KEEP_MASS_FLOW_SPECS)
 * @property {boolean} ANALYZE - Attribute-usage analysis (SIM_ANALYZE)
 * @property {number} TIME_MIN - Time of the first iteration (SIM_TIME_MIN)
 * @property {number} TIME_MAX - Length of the time cycle (SIM_TIME_MAX)
 */
export const CONFIG = loadConfig();

/**
 * Builds a simulation configuration from CONFIG and explicit overrides.
 *
 * @throws Error when the resulting values are out of range
 */
export function createSimulationConfig(
  overrides: Partial<SimulationConfig> = {},
): SimulationConfig {
  const config: SimulationConfig = {
    randSeed: CONFIG.RAND_SEED,
    fractionalMass: CONFIG.FRACTIONAL_MASS,
    autocompact: CONFIG.AUTOCOMPACT,
    historyLength: CONFIG.HISTORY_LENGTH,
    keepMassFlowSpecs: CONFIG.KEEP_MASS_FLOW_SPECS,
    analyze: CONFIG.ANALYZE,
    timeMin: CONFIG.TIME_MIN,
    timeMax: CONFIG.TIME_MAX,
    ...overrides,
  };

  if (!Number.isInteger(config.historyLength) || config.historyLength < 0) {
    throw new Error(
      `historyLength must be a non-negative integer; got ${config.historyLength}`,
    );
  }
  if (!Number.isInteger(config.timeMax) || config.timeMax < 1) {
    throw new Error(`timeMax must be a positive integer; got ${config.timeMax}`);
  }
  if (!Number.isInteger(config.timeMin)) {
    throw new Error(`timeMin must be an integer; got ${config.timeMin}`);
  }
  return config;
}
