import { Data } from "effect";
import type { ClimateActuator } from "../climate/types.js";

export class AutoModeActiveError extends Data.TaggedError('AutoModeActive')<{
  actuator: ClimateActuator;
}> {
  public override readonly message = 'Climate control is in auto mode, switch to manual mode first.';
}
