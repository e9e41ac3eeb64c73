/**
 * Simulation lifecycle enumerations.
 *
 * @module shared/constants/SimulationEnums
 */

/**
 * Phase of a group population within one iteration.
 */
export enum PopulationPhase {
  IDLE = "idle",
  RULES_APPLIED = "rules_applied",
  MASS_TRANSFERRED = "mass_transferred",
  POST_ITER_CLEANED = "post_iter_cleaned",
}

/**
 * Mode in which rules are invoked for a group.
 *
 * Only ITERATION checks rule applicability and combines the outcomes of
 * several rules; SETUP and CLEANUP call the rule hooks directly.
 */
export enum RuleMode {
  ITERATION = "iteration",
  SETUP = "setup",
  CLEANUP = "cleanup",
}

/**
 * Events emitted by the simulation runner.
 */
export enum SimulationEventType {
  RUN_START = "run:start",
  ITERATION = "iteration",
  AUTOSTOP = "autostop",
  RUN_END = "run:end",
}
