import { type ActuatorStates, type ClimateActuator, type ClimateReading, type Setpoints } from "../climate/types.js";
import { calculateCyclePolicies } from "./cycle-policy.js";
import { isEffective } from "./effectiveness.js";
import {
  EARLY_SHUTOFF_MIN_RUNTIME_MS,
  INEFFECTIVE_LOCKOUT_MS,
  MAX_RUNTIME_COOLDOWN_MS,
  MAXIMUM_CONTINUOUS_RUNTIME_MS,
  type ActuatorTiming,
  type CycleEvaluation,
  type CyclePolicy,
  type OffCause,
  type SafetyState,
  type Verdict,
} from "./types.js";

type ActuatorEvaluation = {
  readonly timing: ActuatorTiming;
  readonly verdict: Verdict;
};

export const targetReached = (actuator: ClimateActuator, reading: ClimateReading, setpoints: Setpoints): boolean => {
  switch (actuator) {
    case "heater":
      return reading.temperature >= setpoints.targetTemperature;
    case "humidifier":
      return reading.humidity >= setpoints.targetHumidity;
    case "dehumidifier":
      return reading.humidity <= setpoints.targetHumidity;
  }
};

const turnOn = (timing: ActuatorTiming, reading: ClimateReading, now: number): ActuatorEvaluation => ({
  timing: {
    ...timing,
    applied: true,
    lastTurnedOnAt: now,
    restartNotBefore: null,
    effectivenessSample: { temperature: reading.temperature, humidity: reading.humidity, at: now },
  },
  verdict: { _tag: "TurnedOn" },
});

const turnOff = (
  timing: ActuatorTiming,
  cause: OffCause,
  now: number,
  restartNotBefore: number | null = null,
): ActuatorEvaluation => ({
  timing: {
    ...timing,
    applied: false,
    lastTurnedOffAt: now,
    restartNotBefore,
    lastOffCause: cause,
    effectivenessSample: null,
  },
  verdict: { _tag: "TurnedOff", cause },
});

const unchanged = (timing: ActuatorTiming): ActuatorEvaluation => ({
  timing,
  verdict: { _tag: "Unchanged" },
});

/**
 * Filters one actuator's desired state through the duty-cycle rules, in order of precedence:
 * target-reached shutoff, maximum runtime, turn-on gating, turn-off gating.
 */
export const evaluateActuator = (
  actuator: ClimateActuator,
  timing: ActuatorTiming,
  desired: boolean,
  reading: ClimateReading,
  setpoints: Setpoints,
  policy: CyclePolicy,
  now: number,
): ActuatorEvaluation => {
  const reached = targetReached(actuator, reading, setpoints);

  if (timing.applied) {
    if (reached) {
      return turnOff(timing, "target-reached", now);
    }

    const onFor = now - (timing.lastTurnedOnAt ?? now);

    if (onFor >= MAXIMUM_CONTINUOUS_RUNTIME_MS) {
      return turnOff(timing, "max-runtime", now, now + MAX_RUNTIME_COOLDOWN_MS[actuator]);
    }

    if (desired) {
      return unchanged(timing);
    }

    if (onFor >= policy.minimumOnMs) {
      return turnOff(timing, "request", now);
    }

    if (onFor >= EARLY_SHUTOFF_MIN_RUNTIME_MS && !isEffective(actuator, timing, reading, setpoints, now)) {
      return turnOff(timing, "ineffective", now, now + INEFFECTIVE_LOCKOUT_MS);
    }

    return {
      timing,
      verdict: { _tag: "TurnOffDeferred", remainingMs: policy.minimumOnMs - onFor },
    };
  }

  if (!desired) {
    return unchanged(timing);
  }

  if (reached) {
    return {
      timing,
      verdict: { _tag: "TurnOnDeferred", remainingMs: 0, reason: "target-reached" },
    };
  }

  const allowedAt = Math.max(
    timing.lastTurnedOffAt === null ? -Infinity : timing.lastTurnedOffAt + policy.minimumOffMs,
    timing.restartNotBefore ?? -Infinity,
  );

  if (now >= allowedAt) {
    return turnOn(timing, reading, now);
  }

  return {
    timing,
    verdict: { _tag: "TurnOnDeferred", remainingMs: allowedAt - now, reason: "cooldown" },
  };
};

/**
 * Runs every climate actuator through {@link evaluateActuator}. Pure: the caller decides
 * whether `next` is committed, which lets a failed relay write leave the state untouched.
 */
export const evaluateCycle = (
  state: SafetyState,
  desired: ActuatorStates,
  reading: ClimateReading,
  setpoints: Setpoints,
  now: number,
): CycleEvaluation => {
  const policies = calculateCyclePolicies(reading, setpoints);

  const evaluate = (actuator: ClimateActuator) =>
    evaluateActuator(actuator, state[actuator], desired[actuator], reading, setpoints, policies[actuator], now);

  const heater = evaluate("heater");
  let humidifier = evaluate("humidifier");
  let dehumidifier = evaluate("dehumidifier");

  // humidifier and dehumidifier must never run together; the one that was about to start waits
  if (humidifier.timing.applied && dehumidifier.timing.applied) {
    const interlocked = (actuator: ClimateActuator): ActuatorEvaluation => ({
      timing: state[actuator],
      verdict: { _tag: "TurnOnDeferred", remainingMs: 0, reason: "interlock" },
    });

    if (humidifier.verdict._tag === "TurnedOn") {
      humidifier = interlocked("humidifier");
    } else {
      dehumidifier = interlocked("dehumidifier");
    }
  }

  return {
    applied: {
      heater: heater.timing.applied,
      humidifier: humidifier.timing.applied,
      dehumidifier: dehumidifier.timing.applied,
    },
    next: {
      heater: heater.timing,
      humidifier: humidifier.timing,
      dehumidifier: dehumidifier.timing,
    },
    verdicts: {
      heater: heater.verdict,
      humidifier: humidifier.verdict,
      dehumidifier: dehumidifier.verdict,
    },
  };
};

const OPPOSING: Partial<Record<ClimateActuator, ClimateActuator>> = {
  humidifier: "dehumidifier",
  dehumidifier: "humidifier",
};

/**
 * Operator switch of one actuator. None of the rules above are applied, but the timing
 * record is kept up to date so that cooldowns and the runtime limit still hold when
 * automatic control resumes. Switching a humidity actuator on switches its opposite off.
 */
export const overrideActuator = (
  state: SafetyState,
  actuator: ClimateActuator,
  on: boolean,
  now: number,
): Pick<CycleEvaluation, "applied" | "next"> => {
  const opposing = on ? OPPOSING[actuator] : undefined;

  const switched = (timing: ActuatorTiming, to: boolean): ActuatorTiming => {
    if (timing.applied === to) {
      return timing;
    }

    return to
      ? { ...timing, applied: true, lastTurnedOnAt: now, effectivenessSample: null }
      : { ...timing, applied: false, lastTurnedOffAt: now, lastOffCause: "manual", effectivenessSample: null };
  };

  const evaluate = (name: ClimateActuator): ActuatorTiming => {
    if (name === actuator) return switched(state[name], on);
    if (name === opposing) return switched(state[name], false);

    return state[name];
  };

  const next: SafetyState = {
    heater: evaluate("heater"),
    humidifier: evaluate("humidifier"),
    dehumidifier: evaluate("dehumidifier"),
  };

  return {
    applied: {
      heater: next.heater.applied,
      humidifier: next.humidifier.applied,
      dehumidifier: next.dehumidifier.applied,
    },
    next,
  };
};
