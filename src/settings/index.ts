import { Clock, Context, Data, Effect, Layer, Option, Ref, Schema } from "effect";
import type { Setpoints } from "../climate/types.js";
import { DEFAULT_LIGHT_SCHEDULE, LightScheduleSchema, type LightSchedule } from "../light-schedule/schedule.js";
import { SettingsStore, type SettingsEntries, type SettingsStoreError } from "../settings-store/types.js";
import {
  DEFAULT_SETPOINTS,
  DEFAULT_SETTINGS,
  SettingKeys,
  type ClimateMode,
  type LightMode,
} from "./defaults.js";
import {
  decodeClimateMode,
  decodeLightMode,
  parseField,
  parseLightSchedule,
  parseSetpoints,
  parseTemperatureSchedule,
} from "./parsers.js";
import {
  scheduledTargetTemperature,
  TemperatureScheduleSchema,
  type TemperatureSchedule,
} from "./temperature-schedule.js";

export class InvalidSettingError extends Data.TaggedError("InvalidSetting")<{
  message: string;
}> {}

export type SettingsSnapshot = {
  readonly setpoints: Setpoints;
  readonly mode: ClimateMode;
  readonly lightMode: LightMode;
  readonly lightSchedule: LightSchedule;
  readonly temperatureSchedule: Option.Option<TemperatureSchedule>;
};

export const SetpointsUpdateSchema = Schema.Struct({
  targetTemperature: Schema.optional(Schema.Number.pipe(Schema.finite())),
  temperatureTolerance: Schema.optional(Schema.Number.pipe(Schema.finite(), Schema.nonNegative())),
  targetHumidity: Schema.optional(Schema.Number.pipe(Schema.finite())),
  humidityTolerance: Schema.optional(Schema.Number.pipe(Schema.finite(), Schema.nonNegative())),
  predictiveControlEnabled: Schema.optional(Schema.Boolean),
});

export type SetpointsUpdate = Schema.Schema.Type<typeof SetpointsUpdateSchema>;

const TemperatureScheduleJson = Schema.parseJson(TemperatureScheduleSchema);

export class ClimateSettings extends Context.Tag("ClimateSettings")<
  ClimateSettings,
  {
    /**
     * One consistent view of every setting, with the temperature schedule already applied
     * to the target temperature. Falls back to the last good values and never fails.
     */
    readonly snapshot: () => Effect.Effect<SettingsSnapshot>;
    readonly initializeDefaults: () => Effect.Effect<void, SettingsStoreError>;
    readonly updateSetpoints: (update: SetpointsUpdate) => Effect.Effect<void, SettingsStoreError | InvalidSettingError>;
    readonly setMode: (mode: ClimateMode) => Effect.Effect<void, SettingsStoreError>;
    readonly setLightMode: (mode: LightMode) => Effect.Effect<void, SettingsStoreError>;
    readonly setLightSchedule: (schedule: LightSchedule) => Effect.Effect<void, SettingsStoreError | InvalidSettingError>;
    readonly setTemperatureSchedule: (schedule: TemperatureSchedule) => Effect.Effect<void, SettingsStoreError | InvalidSettingError>;
  }>
(){}

export type IClimateSettings = Context.Tag.Service<typeof ClimateSettings>;

const INITIAL_SNAPSHOT: SettingsSnapshot = {
  setpoints: DEFAULT_SETPOINTS,
  mode: 'manual',
  lightMode: 'schedule',
  lightSchedule: DEFAULT_LIGHT_SCHEDULE,
  temperatureSchedule: Option.none(),
};

const parseSnapshot = (entries: SettingsEntries, lastGood: SettingsSnapshot): SettingsSnapshot => ({
  setpoints: parseSetpoints(entries, lastGood.setpoints),
  mode: parseField(entries, SettingKeys.mode, decodeClimateMode, lastGood.mode),
  lightMode: parseField(entries, SettingKeys.lightMode, decodeLightMode, lastGood.lightMode),
  lightSchedule: parseLightSchedule(entries, lastGood.lightSchedule),
  temperatureSchedule: parseTemperatureSchedule(entries, lastGood.temperatureSchedule),
});

const applyTemperatureSchedule = (snapshot: SettingsSnapshot, now: Date): SettingsSnapshot =>
  Option.match(Option.flatMap(snapshot.temperatureSchedule, (schedule) => scheduledTargetTemperature(schedule, now)), {
    onNone: () => snapshot,
    onSome: (targetTemperature) => ({
      ...snapshot,
      setpoints: { ...snapshot.setpoints, targetTemperature },
    }),
  });

const invalid = (error: { readonly message: string }) => new InvalidSettingError({ message: error.message });

export const makeClimateSettings = Effect.gen(function* () {
  const store = yield* SettingsStore;
  const lastGood = yield* Ref.make(INITIAL_SNAPSHOT);

  const snapshot = () => Effect.gen(function* () {
    const previous = yield* Ref.get(lastGood);

    const parsed = yield* store.getAll().pipe(
      Effect.map((entries) => parseSnapshot(entries, previous)),
      Effect.catchAll((err) => Effect.logWarning(`Using last known settings: ${err.message}`).pipe(
        Effect.as(previous)
      )),
    );

    yield* Ref.set(lastGood, parsed);

    const now = new Date(yield* Clock.currentTimeMillis);

    return applyTemperatureSchedule(parsed, now);
  });

  const initializeDefaults = () => Effect.gen(function* () {
    const existing = yield* store.getAll();
    const missing = Object.fromEntries(
      Object.entries(DEFAULT_SETTINGS).filter(([key]) => existing[key] === undefined)
    );

    if (Object.keys(missing).length > 0) {
      yield* Effect.logInfo('Writing default settings', { keys: Object.keys(missing) });
      yield* store.setMany(missing);
    }
  });

  const updateSetpoints = (update: SetpointsUpdate) => Effect.gen(function* () {
    const valid = yield* Schema.validate(SetpointsUpdateSchema)(update).pipe(Effect.mapError(invalid));

    const entries: Record<string, string> = {};
    if (valid.targetTemperature !== undefined) entries[SettingKeys.targetTemperature] = String(valid.targetTemperature);
    if (valid.temperatureTolerance !== undefined) entries[SettingKeys.temperatureTolerance] = String(valid.temperatureTolerance);
    if (valid.targetHumidity !== undefined) entries[SettingKeys.targetHumidity] = String(valid.targetHumidity);
    if (valid.humidityTolerance !== undefined) entries[SettingKeys.humidityTolerance] = String(valid.humidityTolerance);
    if (valid.predictiveControlEnabled !== undefined) entries[SettingKeys.predictiveControl] = String(valid.predictiveControlEnabled);

    yield* store.setMany(entries);
    yield* Ref.update(lastGood, (previous) => ({
      ...previous,
      setpoints: {
        targetTemperature: valid.targetTemperature ?? previous.setpoints.targetTemperature,
        temperatureTolerance: valid.temperatureTolerance ?? previous.setpoints.temperatureTolerance,
        targetHumidity: valid.targetHumidity ?? previous.setpoints.targetHumidity,
        humidityTolerance: valid.humidityTolerance ?? previous.setpoints.humidityTolerance,
        predictiveControlEnabled: valid.predictiveControlEnabled ?? previous.setpoints.predictiveControlEnabled,
      },
    }));
  });

  // the schedule is persisted before anyone sees it
  const setLightSchedule = (schedule: LightSchedule) => Effect.gen(function* () {
    const valid = yield* Schema.validate(LightScheduleSchema)(schedule).pipe(Effect.mapError(invalid));

    yield* store.setMany({
      [SettingKeys.lightEnabled]: String(valid.enabled),
      [SettingKeys.lightOnTime]: valid.onTime,
      [SettingKeys.lightOffTime]: valid.offTime,
    });
    yield* Ref.update(lastGood, (previous) => ({ ...previous, lightSchedule: valid }));
  });

  const setTemperatureSchedule = (schedule: TemperatureSchedule) => Effect.gen(function* () {
    const json = yield* Schema.encode(TemperatureScheduleJson)(schedule).pipe(Effect.mapError(invalid));

    yield* store.setMany({ [SettingKeys.temperatureSchedule]: json });
    yield* Ref.update(lastGood, (previous) => ({ ...previous, temperatureSchedule: Option.some(schedule) }));
  });

  const settings: IClimateSettings = {
    snapshot,
    initializeDefaults,
    updateSetpoints,
    setMode: (mode) => store.setMany({ [SettingKeys.mode]: mode }),
    setLightMode: (mode) => store.setMany({ [SettingKeys.lightMode]: mode }),
    setLightSchedule,
    setTemperatureSchedule,
  };

  return settings;
});

export const ClimateSettingsLayer = Layer.effect(ClimateSettings, makeClimateSettings);
