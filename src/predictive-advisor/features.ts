import type { ActuatorStates, ClimateReading } from "../climate/types.js";
import type { ClimateFeatures } from "./types.js";

const flag = (on: boolean): 0 | 1 => (on ? 1 : 0);

export const buildFeatures = (reading: ClimateReading, states: ActuatorStates, now: Date): ClimateFeatures => ({
  temperature: reading.temperature,
  humidity: reading.humidity,
  heater: flag(states.heater),
  humidifier: flag(states.humidifier),
  dehumidifier: flag(states.dehumidifier),
  hour: now.getHours(),
  minute: now.getMinutes(),
  dayOfWeek: now.getDay(),
});
