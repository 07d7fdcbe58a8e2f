import type { IEventLogger } from "./types.js";
import { Effect } from "effect";
import type { ActuatorName, ClimateActuator, TriggeringMode } from "../climate/types.js";

const minutes = (ms: number) => (ms / 60000).toFixed(1);

export class EventLogger implements IEventLogger {

  public onActuatorSwitched(actuator: ActuatorName, on: boolean, mode: TriggeringMode) {
    return Effect.log(`Turned ${actuator} ${on ? 'on' : 'off'} (${mode})`);
  }

  public onTurnOnDeferred(actuator: ClimateActuator, reason: string, remainingMs: number) {
    return Effect.logDebug(`Holding ${actuator} off: ${reason}, ${minutes(remainingMs)}min remaining`);
  }

  public onTurnOffDeferred(actuator: ClimateActuator, remainingMs: number) {
    return Effect.logDebug(`Keeping ${actuator} on for minimum runtime, ${minutes(remainingMs)}min remaining`);
  }

  public onMaxRuntimeReached(actuator: ClimateActuator) {
    return Effect.logWarning(`${actuator} reached its maximum continuous runtime and was switched off`);
  }

  public onIneffectiveShutoff(actuator: ClimateActuator) {
    return Effect.logWarning(`${actuator} is not moving the reading toward target, switched off early`);
  }

  public onCycleSkipped(reason: string) {
    return Effect.logWarning(`Skipping control cycle: ${reason}`);
  }
}
