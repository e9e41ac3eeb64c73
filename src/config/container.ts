import "reflect-metadata";
import { Container } from "inversify";
import { TYPES } from "./Types";
import { createSimulationConfig, type SimulationConfig } from "./config";

/**
 * Dependency injection container configuration.
 *
 * Binds the configuration, the group population and the simulation runner.
 * The default container holds one simulation; `createContainer()` builds
 * independent ones.
 *
 * @module config
 */
import { GroupPopulation } from "../domain/simulation/population/GroupPopulation";
import { SimulationRunner } from "../domain/simulation/core/SimulationRunner";

export function createContainer(
  overrides: Partial<SimulationConfig> = {},
): Container {
  const container = new Container();

  container
    .bind<SimulationConfig>(TYPES.SimulationConfig)
    .toConstantValue(createSimulationConfig(overrides));

  container
    .bind<GroupPopulation>(TYPES.GroupPopulation)
    .to(GroupPopulation)
    .inSingletonScope();

  container
    .bind<SimulationRunner>(TYPES.SimulationRunner)
    .to(SimulationRunner)
    .inSingletonScope();

  return container;
}

export const container = createContainer();
