import type { ClimateReading, Setpoints } from "../climate/types.js";
import { MINUTE_MS, type CyclePolicies, type CyclePolicy } from "./types.js";

const relativeDistancePercent = (target: number, value: number): number =>
  (Math.abs(target - value) / (Math.abs(target) || 1)) * 100;

/**
 * Close to target the actuator runs in short bursts with long rests; far from target
 * it may run longer and rests less.
 */
export const cyclePolicyFor = (target: number, value: number): CyclePolicy => {
  const percentOff = relativeDistancePercent(target, value);

  if (percentOff < 5) {
    return { minimumOnMs: 10 * MINUTE_MS, minimumOffMs: 20 * MINUTE_MS };
  }

  if (percentOff < 15) {
    return { minimumOnMs: 20 * MINUTE_MS, minimumOffMs: 10 * MINUTE_MS };
  }

  return {
    minimumOnMs: Math.min(60 * MINUTE_MS, 30 * MINUTE_MS + percentOff * 1000 * 60),
    minimumOffMs: 5 * MINUTE_MS,
  };
};

export const calculateCyclePolicies = (reading: ClimateReading, setpoints: Setpoints): CyclePolicies => {
  const humidityPolicy = cyclePolicyFor(setpoints.targetHumidity, reading.humidity);

  return {
    heater: cyclePolicyFor(setpoints.targetTemperature, reading.temperature),
    humidifier: humidityPolicy,
    dehumidifier: humidityPolicy,
  };
};
