import { Option, Schema } from "effect";
import { ClockTimeSchema, clockTimeOf } from "../climate/clock-time.js";

export const TemperaturePeriodSchema = Schema.Struct({
  time: ClockTimeSchema,
  temperature: Schema.Number.pipe(Schema.finite()),
});

export const TemperatureScheduleSchema = Schema.Struct({
  enabled: Schema.Boolean,
  periods: Schema.Array(TemperaturePeriodSchema).pipe(Schema.minItems(1), Schema.maxItems(4)),
});

export type TemperatureSchedule = typeof TemperatureScheduleSchema.Type

/**
 * Target temperature of the period in effect at `now`: the latest period that started
 * today, or the last period of the previous day before the first one starts.
 */
export const scheduledTargetTemperature = (schedule: TemperatureSchedule, now: Date): Option.Option<number> => {
  if (!schedule.enabled || schedule.periods.length === 0) {
    return Option.none();
  }

  const current = clockTimeOf(now);
  const periods = [...schedule.periods].sort((a, b) => a.time.localeCompare(b.time));
  const started = periods.filter((period) => period.time <= current);
  const active = started.length > 0 ? started[started.length - 1] : periods[periods.length - 1];

  return Option.fromNullable(active).pipe(Option.map((period) => period.temperature));
};
