import type { Setpoints } from "../climate/types.js";
import { DEFAULT_LIGHT_SCHEDULE } from "../light-schedule/schedule.js";
import type { SettingsEntries } from "../settings-store/types.js";

export const SettingKeys = {
  mode: 'mode',
  lightMode: 'light_mode',
  targetTemperature: 'target_temp',
  temperatureTolerance: 'temp_tolerance',
  targetHumidity: 'target_humidity',
  humidityTolerance: 'humidity_tolerance',
  predictiveControl: 'use_ml',
  lightEnabled: 'light_enabled',
  lightOnTime: 'light_on_time',
  lightOffTime: 'light_off_time',
  temperatureSchedule: 'temp_schedule',
} as const;

export type ClimateMode = 'auto' | 'manual';
export type LightMode = 'schedule' | 'manual';

export const DEFAULT_SETPOINTS: Setpoints = {
  targetTemperature: 22.0,
  temperatureTolerance: 1.0,
  targetHumidity: 60.0,
  humidityTolerance: 5.0,
  predictiveControlEnabled: true,
};

// written on first start for every key the store does not have yet
export const DEFAULT_SETTINGS: SettingsEntries = {
  [SettingKeys.mode]: 'manual',
  [SettingKeys.lightMode]: 'schedule',
  [SettingKeys.targetTemperature]: '22.0',
  [SettingKeys.temperatureTolerance]: '1.0',
  [SettingKeys.targetHumidity]: '60.0',
  [SettingKeys.humidityTolerance]: '5.0',
  [SettingKeys.predictiveControl]: 'true',
  [SettingKeys.lightEnabled]: String(DEFAULT_LIGHT_SCHEDULE.enabled),
  [SettingKeys.lightOnTime]: DEFAULT_LIGHT_SCHEDULE.onTime,
  [SettingKeys.lightOffTime]: DEFAULT_LIGHT_SCHEDULE.offTime,
};
