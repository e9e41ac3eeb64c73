/**
 * Error taxonomy of the simulation engine.
 *
 * All errors are fatal to the call that raised them and propagate to the
 * caller; the engine never retries or swallows them.
 *
 * @module domain/simulation/errors
 */

/**
 * Raised when a simulation is assembled in an invalid order (e.g., a rule
 * added after groups exist, or a group added before any rule).
 */
export class SimulationConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SimulationConstructionError";
  }
}

/**
 * Raised on a direct attribute or relation write to a registered group.
 *
 * Registered groups change only through splitting: a group at iteration n is
 * split into groups that are combined to form the population at n+1.
 */
export class GroupFrozenError extends Error {
  constructor(
    public readonly field: "attribute" | "relation",
    public readonly key: string,
  ) {
    super(`Attempting to set ${field} '${key}' of a registered group.`);
    this.name = "GroupFrozenError";
  }
}

/**
 * Raised when a split probability is not a number in [0, 1].
 */
export class InvalidProbabilityError extends Error {
  constructor(public readonly value: number) {
    super(`The probability 'p' must be in the [0, 1] range; got ${value}.`);
    this.name = "InvalidProbabilityError";
  }
}

/**
 * Raised when a mass delta is requested further back than the population
 * history retains.
 */
export class HistoryDepthError extends Error {
  constructor(
    public readonly requested: number,
    public readonly retained: number,
  ) {
    super(
      `History delta (${requested}) is larger than the history length (${retained}).`,
    );
    this.name = "HistoryDepthError";
  }
}

/**
 * Raised when population operations are invoked out of lifecycle order.
 */
export class PopulationUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PopulationUsageError";
  }
}
