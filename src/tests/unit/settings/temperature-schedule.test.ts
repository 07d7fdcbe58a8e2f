import { describe, it, expect } from "@effect/vitest";
import { Option } from "effect";
import { scheduledTargetTemperature, type TemperatureSchedule } from "../../../settings/temperature-schedule.js";

const at = (hours: number, minutes: number) => new Date(2024, 0, 15, hours, minutes);

describe("temperature schedule", () => {
  const schedule: TemperatureSchedule = {
    enabled: true,
    // deliberately out of order
    periods: [
      { time: '18:00', temperature: 21 },
      { time: '06:00', temperature: 20 },
      { time: '12:00', temperature: 24 },
    ],
  };

  it("should use the latest period that has started", () => {
    expect(scheduledTargetTemperature(schedule, at(6, 0))).toEqual(Option.some(20));
    expect(scheduledTargetTemperature(schedule, at(13, 30))).toEqual(Option.some(24));
    expect(scheduledTargetTemperature(schedule, at(23, 0))).toEqual(Option.some(21));
  });

  it("should carry the last period over midnight", () => {
    expect(scheduledTargetTemperature(schedule, at(5, 59))).toEqual(Option.some(21));
  });

  it("should yield nothing while disabled", () => {
    expect(scheduledTargetTemperature({ ...schedule, enabled: false }, at(13, 0))).toEqual(Option.none());
  });
});
