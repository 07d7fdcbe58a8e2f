import type { ActuatorStates, ClimateReading, Prediction, Setpoints } from "../climate/types.js";

type HumidityDecision = Pick<ActuatorStates, "humidifier" | "dehumidifier">;

const HUMIDIFY: HumidityDecision = { humidifier: true, dehumidifier: false };
const DEHUMIDIFY: HumidityDecision = { humidifier: false, dehumidifier: true };
const HOLD: HumidityDecision = { humidifier: false, dehumidifier: false };

const band = (target: number, tolerance: number) => ({
  low: target - tolerance,
  high: target + tolerance,
});

export const decideHeater = (
  temperature: number,
  setpoints: Setpoints,
  heaterOn: boolean,
  predictedTemperature?: number,
): boolean => {
  const { low, high } = band(setpoints.targetTemperature, setpoints.temperatureTolerance);

  if (predictedTemperature !== undefined) {
    if (predictedTemperature < low) return true;
    if (predictedTemperature > high) return false;

    return predictedTemperature < setpoints.targetTemperature;
  }

  if (temperature < low) return true;
  if (temperature >= setpoints.targetTemperature) return false;

  // hysteresis: between low and target the heater keeps doing what it was doing
  return heaterOn;
};

export const decideHumidity = (
  humidity: number,
  setpoints: Setpoints,
  predictedHumidity?: number,
): HumidityDecision => {
  const { low, high } = band(setpoints.targetHumidity, setpoints.humidityTolerance);

  if (predictedHumidity !== undefined) {
    if (predictedHumidity < low) return HUMIDIFY;
    if (predictedHumidity > high) return DEHUMIDIFY;
    if (predictedHumidity < setpoints.targetHumidity) return HUMIDIFY;
    if (predictedHumidity > setpoints.targetHumidity) return DEHUMIDIFY;

    return HOLD;
  }

  if (humidity < low) return HUMIDIFY;
  if (humidity > high) return DEHUMIDIFY;

  return HOLD;
};

/**
 * Desired actuator states for one control cycle.
 *
 * A prediction only takes part when predictive control is enabled in the setpoints.
 */
export const decide = (
  reading: ClimateReading,
  setpoints: Setpoints,
  currentStates: ActuatorStates,
  prediction?: Prediction,
): ActuatorStates => {
  const predictive = setpoints.predictiveControlEnabled && prediction !== undefined;

  const heater = decideHeater(
    reading.temperature,
    setpoints,
    currentStates.heater,
    predictive ? reading.temperature + prediction.temperatureDelta : undefined,
  );

  const humidity = decideHumidity(
    reading.humidity,
    setpoints,
    predictive ? reading.humidity + prediction.humidityDelta : undefined,
  );

  return { heater, ...humidity };
};
