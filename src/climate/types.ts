import { Schema } from "effect";

export const ClimateActuatorSchema = Schema.Literal("heater", "humidifier", "dehumidifier");

export type ClimateActuator = Schema.Schema.Type<typeof ClimateActuatorSchema>;

export type ActuatorName = ClimateActuator | "light";

export const CLIMATE_ACTUATORS: readonly ClimateActuator[] = ["heater", "humidifier", "dehumidifier"];

export type ActuatorStates = Record<ClimateActuator, boolean>;

export const ALL_OFF: ActuatorStates = {
  heater: false,
  humidifier: false,
  dehumidifier: false,
};

export type ClimateReading = {
  readonly temperature: number; // Celsius
  readonly humidity: number; // %RH
};

export type Setpoints = {
  readonly targetTemperature: number;
  readonly temperatureTolerance: number;
  readonly targetHumidity: number;
  readonly humidityTolerance: number;
  readonly predictiveControlEnabled: boolean;
};

export type Prediction = {
  readonly temperatureDelta: number;
  readonly humidityDelta: number;
  readonly horizonMinutes: number;
};

// "auto" for the climate loop, "schedule" for the light scheduler, "manual" for operator overrides
export type TriggeringMode = "auto" | "schedule" | "manual";
