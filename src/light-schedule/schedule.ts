import { Schema } from "effect";
import { ClockTimeSchema, clockTimeOf } from "../climate/clock-time.js";

export const LightScheduleSchema = Schema.Struct({
  enabled: Schema.Boolean,
  onTime: ClockTimeSchema,
  offTime: ClockTimeSchema,
});

export type LightSchedule = typeof LightScheduleSchema.Type

export const DEFAULT_LIGHT_SCHEDULE: LightSchedule = {
  enabled: false,
  onTime: '06:00',
  offTime: '22:00',
};

export type LightPhase = 'disabled' | 'scheduled-on' | 'scheduled-off';

export const lightPhase = (schedule: LightSchedule, now: Date): LightPhase => {
  if (!schedule.enabled) {
    return 'disabled';
  }

  const current = clockTimeOf(now);
  const { onTime, offTime } = schedule;

  const on = onTime < offTime
    ? onTime <= current && current < offTime
    // window crosses midnight
    : current >= onTime || current < offTime;

  return on ? 'scheduled-on' : 'scheduled-off';
};

export const shouldLightBeOn = (schedule: LightSchedule, now: Date): boolean =>
  lightPhase(schedule, now) === 'scheduled-on';
