import "reflect-metadata";

export { CONFIG, createSimulationConfig, loadConfig } from "./config/config";
export type { SimulationConfig } from "./config/config";
export { TYPES } from "./config/Types";
export { container, createContainer } from "./config/container";

export * from "./domain/simulation/entities";
export * from "./domain/simulation/errors";
export { combineSplitSpecs, collectClaims } from "./domain/simulation/population/RuleCombinator";
export { GroupPopulation } from "./domain/simulation/population/GroupPopulation";
export type {
  LastIterationInfo,
  MassFlowSpec,
} from "./domain/simulation/population/GroupPopulation";
export { PopulationHistory } from "./domain/simulation/population/PopulationHistory";
export type { PopulationHistoryEntry } from "./domain/simulation/population/PopulationHistory";
export { AttributeUsageTracker } from "./domain/simulation/analysis/AttributeUsageTracker";
export type { AttributeUsageReport } from "./domain/simulation/analysis/AttributeUsageTracker";
export { Rule } from "./domain/simulation/rules/Rule";
export type { IterationWindow } from "./domain/simulation/rules/Rule";
export { GroupMassProbe } from "./domain/simulation/probes/GroupMassProbe";
export type {
  GroupMassProbeOptions,
  ProbeRow,
  ProbeSeries,
} from "./domain/simulation/probes/GroupMassProbe";
export { Timer } from "./domain/simulation/core/Timer";
export { SimulationRunner } from "./domain/simulation/core/SimulationRunner";
export type { SimulationPragmas } from "./domain/simulation/core/SimulationRunner";

export { EntityState, EntityType } from "./shared/constants/EntityEnums";
export {
  PopulationPhase,
  RuleMode,
  SimulationEventType,
} from "./shared/constants/SimulationEnums";
export type * from "./shared/types/simulation/entities";
export type * from "./shared/types/simulation/rules";
export type * from "./shared/types/simulation/events";
export { logger, Logger, LogCategory, LogLevel } from "./infrastructure/utils/logger";
export { RandomUtils } from "./shared/utils/RandomUtils";
