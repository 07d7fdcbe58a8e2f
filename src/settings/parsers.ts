import { Option, Schema } from "effect";
import type { Setpoints } from "../climate/types.js";
import { ClockTimeSchema } from "../climate/clock-time.js";
import type { LightSchedule } from "../light-schedule/schedule.js";
import type { SettingsEntries } from "../settings-store/types.js";
import { SettingKeys, type ClimateMode, type LightMode } from "./defaults.js";
import { TemperatureScheduleSchema, type TemperatureSchedule } from "./temperature-schedule.js";

type Decoder<A> = (value: string) => Option.Option<A>;

const decodeNumber: Decoder<number> = Schema.decodeUnknownOption(
  Schema.NumberFromString.pipe(Schema.finite())
);

const decodeTolerance: Decoder<number> = Schema.decodeUnknownOption(
  Schema.NumberFromString.pipe(Schema.finite(), Schema.nonNegative())
);

const decodeBooleanLiteral = Schema.decodeUnknownOption(Schema.Literal('true', 'false'));

export const decodeFlag: Decoder<boolean> = (value) =>
  decodeBooleanLiteral(value.trim().toLowerCase()).pipe(Option.map((literal) => literal === 'true'));

const decodeClockTime: Decoder<string> = Schema.decodeUnknownOption(ClockTimeSchema);

export const decodeClimateMode: Decoder<ClimateMode> = Schema.decodeUnknownOption(Schema.Literal('auto', 'manual'));
export const decodeLightMode: Decoder<LightMode> = Schema.decodeUnknownOption(Schema.Literal('schedule', 'manual'));

const decodeTemperatureSchedule: Decoder<TemperatureSchedule> = Schema.decodeUnknownOption(
  Schema.parseJson(TemperatureScheduleSchema)
);

/**
 * Value stored under `key`, or `fallback` when the key is missing or does not parse.
 */
export const parseField = <A>(entries: SettingsEntries, key: string, decode: Decoder<A>, fallback: A): A =>
  Option.fromNullable(entries[key]).pipe(
    Option.flatMap(decode),
    Option.getOrElse(() => fallback),
  );

export const parseSetpoints = (entries: SettingsEntries, fallback: Setpoints): Setpoints => ({
  targetTemperature: parseField(entries, SettingKeys.targetTemperature, decodeNumber, fallback.targetTemperature),
  temperatureTolerance: parseField(entries, SettingKeys.temperatureTolerance, decodeTolerance, fallback.temperatureTolerance),
  targetHumidity: parseField(entries, SettingKeys.targetHumidity, decodeNumber, fallback.targetHumidity),
  humidityTolerance: parseField(entries, SettingKeys.humidityTolerance, decodeTolerance, fallback.humidityTolerance),
  predictiveControlEnabled: parseField(entries, SettingKeys.predictiveControl, decodeFlag, fallback.predictiveControlEnabled),
});

export const parseLightSchedule = (entries: SettingsEntries, fallback: LightSchedule): LightSchedule => ({
  enabled: parseField(entries, SettingKeys.lightEnabled, decodeFlag, fallback.enabled),
  onTime: parseField(entries, SettingKeys.lightOnTime, decodeClockTime, fallback.onTime),
  offTime: parseField(entries, SettingKeys.lightOffTime, decodeClockTime, fallback.offTime),
});

/**
 * A missing key means no schedule; an unparsable one keeps the previous schedule.
 */
export const parseTemperatureSchedule = (
  entries: SettingsEntries,
  fallback: Option.Option<TemperatureSchedule>,
): Option.Option<TemperatureSchedule> => {
  const raw = entries[SettingKeys.temperatureSchedule];

  if (raw === undefined) {
    return Option.none();
  }

  return Option.orElse(decodeTemperatureSchedule(raw), () => fallback);
};
