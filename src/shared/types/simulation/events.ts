import type { AttributeUsageReport } from "@/domain/simulation/analysis/AttributeUsageTracker";
import { SimulationEventType } from "../../constants/SimulationEnums";

export interface RunStartEvent {
  runCnt: number;
  iterations: number;
  mass: number;
  groupCnt: number;
  siteCnt: number;
}

export interface IterationEvent {
  iter: number;
  t: number;
  mass: number;
  massFlow: number;
  groupCnt: number;
}

export interface AutostopEvent {
  iter: number;
  massFlow: number;
  massFlowProp: number;
}

export interface RunEndEvent {
  runCnt: number;
  iterations: number;
  mass: number;
  groupCnt: number;
  usage: AttributeUsageReport | null;
}

/**
 * Payload of every event the simulation runner emits.
 */
export interface SimulationEventMap {
  [SimulationEventType.RUN_START]: RunStartEvent;
  [SimulationEventType.ITERATION]: IterationEvent;
  [SimulationEventType.AUTOSTOP]: AutostopEvent;
  [SimulationEventType.RUN_END]: RunEndEvent;
}
