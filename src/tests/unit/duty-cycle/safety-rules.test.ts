import { describe, it, expect } from "@effect/vitest";
import { ALL_OFF, type ActuatorStates, type ClimateReading, type Setpoints } from "../../../climate/types.js";
import { evaluateCycle, overrideActuator, targetReached } from "../../../duty-cycle/safety-rules.js";
import { initialSafetyState, initialTiming, MINUTE_MS, type SafetyState } from "../../../duty-cycle/types.js";

const setpoints: Setpoints = {
  targetTemperature: 22,
  temperatureTolerance: 1,
  targetHumidity: 60,
  humidityTolerance: 5,
  predictiveControlEnabled: false,
};

const cycle = (state: SafetyState, desired: Partial<ActuatorStates>, reading: ClimateReading, now: number) =>
  evaluateCycle(state, { ...ALL_OFF, ...desired }, reading, setpoints, now);

describe("safety-rules", () => {
  describe("targetReached", () => {
    it("should use the stopping condition of each actuator", () => {
      expect(targetReached("heater", { temperature: 22, humidity: 60 }, setpoints)).toBe(true);
      expect(targetReached("heater", { temperature: 21.9, humidity: 60 }, setpoints)).toBe(false);
      expect(targetReached("humidifier", { temperature: 22, humidity: 60 }, setpoints)).toBe(true);
      expect(targetReached("dehumidifier", { temperature: 22, humidity: 60.1 }, setpoints)).toBe(false);
    });
  });

  describe("evaluateCycle", () => {
    it("should switch on an idle heater and record a switch-on sample", () => {
      const result = cycle(initialSafetyState(), { heater: true }, { temperature: 19, humidity: 60 }, 0);

      expect(result.applied).toEqual({ heater: true, humidifier: false, dehumidifier: false });
      expect(result.verdicts.heater).toEqual({ _tag: "TurnedOn" });
      expect(result.next.heater.lastTurnedOnAt).toBe(0);
      expect(result.next.heater.effectivenessSample).toEqual({ temperature: 19, humidity: 60, at: 0 });
    });

    it("should hold a heater on until its minimum runtime has passed", () => {
      const { next } = cycle(initialSafetyState(), { heater: true }, { temperature: 19, humidity: 60 }, 0);

      // 20 °C is 9% off target: 20 min minimum runtime
      const early = cycle(next, { heater: false }, { temperature: 20, humidity: 60 }, 20 * MINUTE_MS - 1000);
      expect(early.applied.heater).toBe(true);
      expect(early.verdicts.heater).toEqual({ _tag: "TurnOffDeferred", remainingMs: 1000 });

      const due = cycle(next, { heater: false }, { temperature: 20, humidity: 60 }, 20 * MINUTE_MS);
      expect(due.applied.heater).toBe(false);
      expect(due.verdicts.heater).toEqual({ _tag: "TurnedOff", cause: "request" });
    });

    it("should switch off as soon as the target is reached, ignoring the minimum runtime", () => {
      const { next } = cycle(initialSafetyState(), { heater: true }, { temperature: 19, humidity: 60 }, 0);

      const result = cycle(next, { heater: true }, { temperature: 22, humidity: 60 }, 1000);

      expect(result.applied.heater).toBe(false);
      expect(result.verdicts.heater).toEqual({ _tag: "TurnedOff", cause: "target-reached" });
    });

    it("should not switch on while the target is already reached", () => {
      const result = cycle(initialSafetyState(), { heater: true }, { temperature: 22.5, humidity: 60 }, 0);

      expect(result.applied.heater).toBe(false);
      expect(result.verdicts.heater).toEqual({ _tag: "TurnOnDeferred", remainingMs: 0, reason: "target-reached" });
    });

    it("should stop a heater after one hour and keep it off for the cooldown", () => {
      const { next: running } = cycle(initialSafetyState(), { heater: true }, { temperature: 19, humidity: 60 }, 0);

      const tripped = cycle(running, { heater: true }, { temperature: 20, humidity: 60 }, 60 * MINUTE_MS);
      expect(tripped.verdicts.heater).toEqual({ _tag: "TurnedOff", cause: "max-runtime" });
      expect(tripped.next.heater.restartNotBefore).toBe(70 * MINUTE_MS);

      const waiting = cycle(tripped.next, { heater: true }, { temperature: 20, humidity: 60 }, 70 * MINUTE_MS - 1000);
      expect(waiting.applied.heater).toBe(false);
      expect(waiting.verdicts.heater).toEqual({ _tag: "TurnOnDeferred", remainingMs: 1000, reason: "cooldown" });

      const restarted = cycle(tripped.next, { heater: true }, { temperature: 20, humidity: 60 }, 70 * MINUTE_MS);
      expect(restarted.verdicts.heater).toEqual({ _tag: "TurnedOn" });
    });

    it("should use the shorter max-runtime cooldown for the dehumidifier", () => {
      const { next: running } = cycle(initialSafetyState(), { dehumidifier: true }, { temperature: 22, humidity: 72 }, 0);

      const tripped = cycle(running, { dehumidifier: true }, { temperature: 22, humidity: 70 }, 60 * MINUTE_MS);
      expect(tripped.verdicts.dehumidifier).toEqual({ _tag: "TurnedOff", cause: "max-runtime" });
      expect(tripped.next.dehumidifier.restartNotBefore).toBe(67.5 * MINUTE_MS);

      // 70 %RH is far from target, so the 5 min minimum-off is shorter than the cooldown
      const waiting = cycle(tripped.next, { dehumidifier: true }, { temperature: 22, humidity: 70 }, 65 * MINUTE_MS);
      expect(waiting.verdicts.dehumidifier).toEqual({ _tag: "TurnOnDeferred", remainingMs: 2.5 * MINUTE_MS, reason: "cooldown" });

      const restarted = cycle(tripped.next, { dehumidifier: true }, { temperature: 22, humidity: 70 }, 67.5 * MINUTE_MS);
      expect(restarted.applied.dehumidifier).toBe(true);
    });

    it("should stop an ineffective heater early and lock it out for 30 minutes", () => {
      const { next: running } = cycle(initialSafetyState(), { heater: true }, { temperature: 15, humidity: 60 }, 0);

      const stopped = cycle(running, { heater: false }, { temperature: 15.05, humidity: 60 }, 12 * MINUTE_MS);
      expect(stopped.verdicts.heater).toEqual({ _tag: "TurnedOff", cause: "ineffective" });
      expect(stopped.next.heater.restartNotBefore).toBe(42 * MINUTE_MS);

      const retry = cycle(stopped.next, { heater: true }, { temperature: 15, humidity: 60 }, 41 * MINUTE_MS);
      expect(retry.verdicts.heater).toEqual({ _tag: "TurnOnDeferred", remainingMs: MINUTE_MS, reason: "cooldown" });
    });

    it("should not stop an ineffective heater before it has run for 10 minutes", () => {
      const { next: running } = cycle(initialSafetyState(), { heater: true }, { temperature: 20, humidity: 60 }, 0);

      const result = cycle(running, { heater: false }, { temperature: 19.9, humidity: 60 }, 8 * MINUTE_MS);

      expect(result.applied.heater).toBe(true);
      expect(result.verdicts.heater).toEqual({ _tag: "TurnOffDeferred", remainingMs: 12 * MINUTE_MS });
    });

    it("should leave the input state untouched", () => {
      const state = initialSafetyState();

      cycle(state, { heater: true }, { temperature: 19, humidity: 60 }, 0);

      expect(state.heater).toEqual(initialTiming());
    });

    it("should never leave humidifier and dehumidifier on together", () => {
      const state: SafetyState = {
        ...initialSafetyState(),
        humidifier: {
          ...initialTiming(),
          applied: true,
          lastTurnedOnAt: 0,
          effectivenessSample: { temperature: 22, humidity: 50, at: 0 },
        },
      };

      for (let humidity = 50; humidity <= 70; humidity += 0.5) {
        const result = cycle(state, { dehumidifier: true }, { temperature: 22, humidity }, MINUTE_MS);

        expect(result.applied.humidifier && result.applied.dehumidifier).toBe(false);
      }
    });
  });

  describe("overrideActuator", () => {
    it("should switch regardless of the duty-cycle rules and keep the timing record", () => {
      const coolingDown: SafetyState = {
        ...initialSafetyState(),
        heater: { ...initialTiming(), lastTurnedOffAt: 0, restartNotBefore: 10 * MINUTE_MS, lastOffCause: "max-runtime" },
      };

      const { applied, next } = overrideActuator(coolingDown, "heater", true, MINUTE_MS);

      expect(applied).toEqual({ heater: true, humidifier: false, dehumidifier: false });
      expect(next.heater).toMatchObject({ applied: true, lastTurnedOnAt: MINUTE_MS, lastTurnedOffAt: 0 });

      const off = overrideActuator(next, "heater", false, 2 * MINUTE_MS);

      expect(off.next.heater).toMatchObject({ applied: false, lastTurnedOffAt: 2 * MINUTE_MS, lastOffCause: "manual" });
    });

    it("should switch the opposing humidity actuator off", () => {
      const dehumidifying: SafetyState = {
        ...initialSafetyState(),
        dehumidifier: { ...initialTiming(), applied: true, lastTurnedOnAt: 0 },
      };

      const { applied, next } = overrideActuator(dehumidifying, "humidifier", true, MINUTE_MS);

      expect(applied).toEqual({ heater: false, humidifier: true, dehumidifier: false });
      expect(next.dehumidifier.lastTurnedOffAt).toBe(MINUTE_MS);
    });

    it("should leave everything as it is when the actuator is already in that state", () => {
      const state = initialSafetyState();

      expect(overrideActuator(state, "heater", false, MINUTE_MS).next).toEqual(state);
    });
  });
});
