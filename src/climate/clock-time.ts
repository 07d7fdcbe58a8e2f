import { Schema } from "effect";

/**
 * Wall-clock time of day as zero-padded "HH:MM". Zero padding makes plain string
 * comparison agree with chronological order.
 */
export const ClockTimeSchema = Schema.String.pipe(
  Schema.pattern(/^([01]\d|2[0-3]):[0-5]\d$/, { message: () => 'Expected a time of day as HH:MM' }),
);

export type ClockTime = typeof ClockTimeSchema.Type

const pad = (value: number) => value.toString().padStart(2, '0');

export const clockTimeOf = (date: Date): ClockTime => `${pad(date.getHours())}:${pad(date.getMinutes())}`;
