import { Effect } from "effect";
import type { GatewayError } from "../actuator-gateway/errors.js";
import type { IActuatorGateway } from "../actuator-gateway/types.js";
import {
  ALL_OFF,
  CLIMATE_ACTUATORS,
  type ActuatorStates,
  type ClimateActuator,
  type ClimateReading,
  type Setpoints,
  type TriggeringMode,
} from "../climate/types.js";
import { EventLogger } from "../event-logger/index.js";
import type { IEventLogger } from "../event-logger/types.js";
import type { IHistoryLog } from "../history-log/types.js";
import { evaluateCycle, overrideActuator } from "./safety-rules.js";
import { initialSafetyState, initialTiming, type SafetyState, type Verdict } from "./types.js";

/**
 * Owns the timing record of every climate actuator and is the only place that
 * switches them. Nothing is committed unless the relay write went through.
 */
export class DutyCycleSafetyLayer {
  private state: SafetyState = initialSafetyState();

  private lastLogged: ActuatorStates = ALL_OFF;

  public constructor(
    private readonly gateway: IActuatorGateway,
    private readonly historyLog: IHistoryLog,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  /**
   * Adopts relay states found on the board at startup. Relays already on count as
   * switched on `now`.
   */
  public initialize(current: ActuatorStates, now: number): void {
    const adopt = (actuator: ClimateActuator) => ({
      ...initialTiming(),
      applied: current[actuator],
      lastTurnedOnAt: current[actuator] ? now : null,
    });

    this.state = {
      heater: adopt('heater'),
      humidifier: adopt('humidifier'),
      dehumidifier: adopt('dehumidifier'),
    };
    this.lastLogged = { ...current };
  }

  public getAppliedStates(): ActuatorStates {
    return {
      heater: this.state.heater.applied,
      humidifier: this.state.humidifier.applied,
      dehumidifier: this.state.dehumidifier.applied,
    };
  }

  public getSafetyState(): SafetyState {
    return this.state;
  }

  public apply(
    desired: ActuatorStates,
    reading: ClimateReading,
    setpoints: Setpoints,
    now: number,
  ): Effect.Effect<ActuatorStates, GatewayError> {
    const deps = this;

    return Effect.gen(function* () {
      const evaluation = evaluateCycle(deps.state, desired, reading, setpoints, now);
      const changed = CLIMATE_ACTUATORS.some((actuator) => evaluation.applied[actuator] !== deps.state[actuator].applied);

      if (changed) {
        yield* deps.gateway.setActuators(evaluation.applied);
      }

      deps.state = evaluation.next;

      yield* Effect.forEach(CLIMATE_ACTUATORS, (actuator) => deps.report(actuator, evaluation.verdicts[actuator]), { discard: true });
      yield* deps.logTransitions(evaluation.applied, 'auto');

      return evaluation.applied;
    }).pipe(
      Effect.tap((applied) => Effect.annotateCurrentSpan({ applied })),
      Effect.withSpan('duty-cycle.apply'),
    );
  }

  /**
   * Operator switch that bypasses the duty-cycle rules. The timing record still follows
   * the relays, so automatic control picks up from the real on/off times.
   */
  public switchManually(actuator: ClimateActuator, on: boolean, now: number): Effect.Effect<ActuatorStates, GatewayError> {
    const deps = this;

    return Effect.gen(function* () {
      const { applied, next } = overrideActuator(deps.state, actuator, on, now);
      const changed = CLIMATE_ACTUATORS.some((name) => applied[name] !== deps.state[name].applied);

      if (changed) {
        yield* deps.gateway.setActuators(applied);
      }

      deps.state = next;

      yield* deps.logTransitions(applied, 'manual');

      return applied;
    }).pipe(
      Effect.withSpan('duty-cycle.switch-manually', { attributes: { actuator, on } }),
    );
  }

  private report(actuator: ClimateActuator, verdict: Verdict) {
    switch (verdict._tag) {
      case 'TurnOnDeferred':
        return this.eventLogger.onTurnOnDeferred(actuator, verdict.reason, verdict.remainingMs);
      case 'TurnOffDeferred':
        return this.eventLogger.onTurnOffDeferred(actuator, verdict.remainingMs);
      case 'TurnedOff':
        if (verdict.cause === 'max-runtime') return this.eventLogger.onMaxRuntimeReached(actuator);
        if (verdict.cause === 'ineffective') return this.eventLogger.onIneffectiveShutoff(actuator);
        return Effect.void;
      default:
        return Effect.void;
    }
  }

  private logTransitions(applied: ActuatorStates, mode: TriggeringMode) {
    const deps = this;

    return Effect.forEach(CLIMATE_ACTUATORS, (actuator) => Effect.gen(function* () {
      const state = applied[actuator];

      if (deps.lastLogged[actuator] === state) {
        return;
      }

      deps.lastLogged = { ...deps.lastLogged, [actuator]: state };

      yield* deps.eventLogger.onActuatorSwitched(actuator, state, mode);
      yield* deps.historyLog.logActuatorChange({ actuator, state, mode }).pipe(
        Effect.catchAll((err) => Effect.logWarning(`Failed to record ${actuator} change: ${err.message}`)),
      );
    }), { discard: true });
  }
}
