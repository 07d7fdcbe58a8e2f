import type { ActuatorStates, ClimateActuator } from "../climate/types.js";

export const MINUTE_MS = 60 * 1000;

export const MAXIMUM_CONTINUOUS_RUNTIME_MS = 60 * MINUTE_MS; // 1 hour

export const MAX_RUNTIME_COOLDOWN_MS: Record<ClimateActuator, number> = {
  heater: 10 * MINUTE_MS,
  humidifier: 10 * MINUTE_MS,
  dehumidifier: 7.5 * MINUTE_MS,
};

export const EFFECTIVENESS_WARMUP_MS = 5 * MINUTE_MS;
export const EARLY_SHUTOFF_MIN_RUNTIME_MS = 10 * MINUTE_MS;
export const INEFFECTIVE_LOCKOUT_MS = 30 * MINUTE_MS;

export type OffCause = "request" | "target-reached" | "max-runtime" | "ineffective" | "manual";

export type EffectivenessSample = {
  readonly temperature: number;
  readonly humidity: number;
  readonly at: number;
};

/**
 * Everything the safety rules know about one actuator. Timestamps are epoch millis,
 * `null` meaning "never".
 */
export type ActuatorTiming = {
  readonly applied: boolean;
  readonly lastTurnedOnAt: number | null;
  readonly lastTurnedOffAt: number | null;
  readonly restartNotBefore: number | null;
  readonly lastOffCause: OffCause | null;
  readonly effectivenessSample: EffectivenessSample | null;
};

export type SafetyState = Record<ClimateActuator, ActuatorTiming>;

export type CyclePolicy = {
  readonly minimumOnMs: number;
  readonly minimumOffMs: number;
};

export type CyclePolicies = Record<ClimateActuator, CyclePolicy>;

/**
 * Why an actuator ended the cycle in the state it did.
 */
export type Verdict =
  | { readonly _tag: "Unchanged" }
  | { readonly _tag: "TurnedOn" }
  | { readonly _tag: "TurnedOff"; readonly cause: OffCause }
  | { readonly _tag: "TurnOnDeferred"; readonly remainingMs: number; readonly reason: "cooldown" | "target-reached" | "interlock" }
  | { readonly _tag: "TurnOffDeferred"; readonly remainingMs: number };

export type CycleEvaluation = {
  readonly applied: ActuatorStates;
  readonly next: SafetyState;
  readonly verdicts: Record<ClimateActuator, Verdict>;
};

export const initialTiming = (): ActuatorTiming => ({
  applied: false,
  lastTurnedOnAt: null,
  lastTurnedOffAt: null,
  restartNotBefore: null,
  lastOffCause: null,
  effectivenessSample: null,
});

export const initialSafetyState = (): SafetyState => ({
  heater: initialTiming(),
  humidifier: initialTiming(),
  dehumidifier: initialTiming(),
});
