import type { ClimateActuator, ClimateReading, Setpoints } from "../climate/types.js";
import { EFFECTIVENESS_WARMUP_MS, type ActuatorTiming } from "./types.js";

// how far from target (in the actuator's own unit) counts as "still far"
const FAR_FROM_TARGET = 2;

const MINIMUM_PROGRESS: Record<ClimateActuator, number> = {
  heater: 0.1, // °C since switch-on
  humidifier: 0.5, // %RH since switch-on
  dehumidifier: 0.5,
};

type Progress = {
  // positive when the value moved towards target since the sample
  readonly gained: number;
  // positive while target has not been reached yet
  readonly remaining: number;
};

const progressOf = (
  actuator: ClimateActuator,
  reading: ClimateReading,
  sample: ClimateReading,
  setpoints: Setpoints,
): Progress => {
  switch (actuator) {
    case "heater":
      return {
        gained: reading.temperature - sample.temperature,
        remaining: setpoints.targetTemperature - reading.temperature,
      };
    case "humidifier":
      return {
        gained: reading.humidity - sample.humidity,
        remaining: setpoints.targetHumidity - reading.humidity,
      };
    case "dehumidifier":
      return {
        gained: sample.humidity - reading.humidity,
        remaining: reading.humidity - setpoints.targetHumidity,
      };
  }
};

/**
 * Whether a running actuator is measurably moving the room towards its target.
 * Without a switch-on sample, or before the warm-up has elapsed, it gets the benefit of the doubt.
 */
export const isEffective = (
  actuator: ClimateActuator,
  timing: ActuatorTiming,
  reading: ClimateReading,
  setpoints: Setpoints,
  now: number,
): boolean => {
  const sample = timing.effectivenessSample;

  if (!timing.applied || sample === null || timing.lastTurnedOnAt === null) {
    return true;
  }

  if (now - timing.lastTurnedOnAt < EFFECTIVENESS_WARMUP_MS) {
    return true;
  }

  const { gained, remaining } = progressOf(actuator, reading, sample, setpoints);

  if (gained <= 0 && remaining > 0) {
    return false;
  }

  if (gained < MINIMUM_PROGRESS[actuator] && remaining > FAR_FROM_TARGET) {
    return false;
  }

  return true;
};
