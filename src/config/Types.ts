/**
 * Dependency injection type symbols.
 *
 * Used by the Inversify container to identify and resolve dependencies.
 *
 * @module config
 */
export const TYPES = {
  SimulationConfig: Symbol.for("SimulationConfig"),
  GroupPopulation: Symbol.for("GroupPopulation"),
  SimulationRunner: Symbol.for("SimulationRunner"),
};
