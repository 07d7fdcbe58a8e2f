import type { Effect } from "effect";
import type { ActuatorName, ClimateActuator, TriggeringMode } from "../climate/types.js";

export type IEventLogger = {
  onActuatorSwitched: (actuator: ActuatorName, on: boolean, mode: TriggeringMode) => Effect.Effect<void>;
  onTurnOnDeferred: (actuator: ClimateActuator, reason: string, remainingMs: number) => Effect.Effect<void>;
  onTurnOffDeferred: (actuator: ClimateActuator, remainingMs: number) => Effect.Effect<void>;
  onMaxRuntimeReached: (actuator: ClimateActuator) => Effect.Effect<void>;
  onIneffectiveShutoff: (actuator: ClimateActuator) => Effect.Effect<void>;
  onCycleSkipped: (reason: string) => Effect.Effect<void>;
};
