import { Clock, Duration, Effect, Fiber, Option, Schedule } from 'effect';
import type { IActuatorGateway } from './actuator-gateway/types.js';
import { decide } from './climate-decision/decision-engine.js';
import type { ActuatorStates, ClimateActuator, ClimateReading } from './climate/types.js';
import type { DutyCycleSafetyLayer } from './duty-cycle/index.js';
import type { IErrorReporter } from './error-reporter.js';
import { AutoModeActiveError } from './errors/auto-mode-active.error.js';
import { MissingSensorDataError } from './errors/missing-sensor-data.error.js';
import { EventLogger } from './event-logger/index.js';
import type { IEventLogger } from './event-logger/types.js';
import type { IPredictiveAdvisor } from './predictive-advisor/index.js';
import { stopWithGrace, trackActivity, type LoopActivity } from './loop.js';
import type { IClimateSettings, SettingsSnapshot } from './settings/index.js';

enum LoopStatus {
  Pending,
  Running,
  Stopped,
}

type TimingConfig = {
  cycleIntervalInMs: number;
  minActionIntervalInMs: number;
  shutdownGraceInMs: number;
};

export type ClimateStatus = {
  readonly enabled: boolean;
  readonly running: boolean;
  readonly settings: SettingsSnapshot | null;
  readonly actuators: ActuatorStates;
  readonly lastActionAt: number | null;
};

const sameStates = (a: ActuatorStates, b: ActuatorStates) =>
  a.heater === b.heater && a.humidifier === b.humidifier && a.dehumidifier === b.dehumidifier;

export class ClimateController {
  private enabled = false;

  private loopStatus: LoopStatus = LoopStatus.Pending;

  private lastActionAt: number | null = null;

  private lastSettings: SettingsSnapshot | null = null;

  private loopFiber: Fiber.RuntimeFiber<void> | null = null;

  private readonly activity: LoopActivity = { busy: false };

  // a cycle and a manual switch never interleave
  private readonly lock = Effect.unsafeMakeSemaphore(1);

  public constructor(
    private readonly gateway: IActuatorGateway,
    private readonly settings: IClimateSettings,
    private readonly safetyLayer: DutyCycleSafetyLayer,
    private readonly advisor: IPredictiveAdvisor,
    private readonly errorReporter: IErrorReporter,
    private readonly eventLogger: IEventLogger = new EventLogger(),
    private readonly timingConfig: TimingConfig = {
      cycleIntervalInMs: 10 * 1000, // 10 seconds
      minActionIntervalInMs: 60 * 1000, // 1 minute
      shutdownGraceInMs: 5 * 1000,
    },
  ) { }

  /**
   * Adopts the relay states found on the board and forks the control loop. The loop
   * idles until {@link enable} is called.
   */
  public start(): Effect.Effect<Fiber.RuntimeFiber<void>> {
    const deps = this;

    return Effect.gen(function* () {
      const found = yield* deps.gateway.getActuatorStates().pipe(
        Effect.catchAll((err) => Effect.logWarning(`Could not read relay states, assuming all off: ${err.message}`).pipe(
          Effect.as({ heater: false, humidifier: false, dehumidifier: false })
        )),
      );
      deps.safetyLayer.initialize(
        { heater: found.heater, humidifier: found.humidifier, dehumidifier: found.dehumidifier },
        yield* Clock.currentTimeMillis,
      );

      deps.loopStatus = LoopStatus.Running;

      const fiber = yield* Effect.repeat(
        trackActivity(deps.activity, deps.runCycle()).pipe(Effect.map(() => deps.loopStatus)),
        {
          schedule: Schedule.spaced(Duration.millis(deps.timingConfig.cycleIntervalInMs)),
          while: (status) => status === LoopStatus.Running,
        }
      ).pipe(Effect.asVoid, Effect.fork);

      deps.loopFiber = fiber;

      return fiber;
    });
  }

  public enable() {
    this.enabled = true;

    return this.settings.setMode('auto').pipe(
      Effect.tap(() => Effect.log('Automatic climate control enabled')),
    );
  }

  public disable() {
    this.enabled = false;

    return this.settings.setMode('manual').pipe(
      Effect.tap(() => Effect.log('Automatic climate control disabled')),
    );
  }

  /**
   * Operator switch of one climate actuator. Refused while automatic control is enabled.
   */
  public switchManually(actuator: ClimateActuator, on: boolean) {
    const deps = this;

    return Effect.gen(function* () {
      if (deps.enabled) {
        return yield* Effect.fail(new AutoModeActiveError({ actuator }));
      }

      yield* deps.safetyLayer.switchManually(actuator, on, yield* Clock.currentTimeMillis);
    }).pipe(deps.lock.withPermits(1));
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public getStatus(): ClimateStatus {
    return {
      enabled: this.enabled,
      running: this.loopStatus === LoopStatus.Running,
      settings: this.lastSettings,
      actuators: this.safetyLayer.getAppliedStates(),
      lastActionAt: this.lastActionAt,
    };
  }

  /**
   * Stops the loop, giving the cycle in progress a bounded time to finish before it is
   * interrupted. Timing state is left as it is.
   */
  public shutdown() {
    const deps = this;

    return Effect.gen(function* () {
      deps.enabled = false;
      deps.loopStatus = LoopStatus.Stopped;

      const fiber = deps.loopFiber;
      if (fiber === null) {
        return;
      }
      deps.loopFiber = null;

      yield* Effect.log('Stopping climate loop', { actuators: deps.safetyLayer.getAppliedStates() });

      yield* stopWithGrace(fiber, deps.activity, Duration.millis(deps.timingConfig.shutdownGraceInMs), 'Climate loop');
    });
  }

  /**
   * One control cycle. Every failure is handled here so the loop keeps running.
   */
  public runCycle(): Effect.Effect<void> {
    const deps = this;

    return Effect.gen(function* () {
      if (!deps.enabled) {
        return;
      }

      const snapshot = yield* deps.settings.snapshot();
      deps.lastSettings = snapshot;
      const { setpoints } = snapshot;

      const sensors = yield* deps.gateway.readClimate();
      if (sensors.temperature === null || sensors.humidity === null) {
        return yield* Effect.fail(new MissingSensorDataError(sensors));
      }
      const reading: ClimateReading = { temperature: sensors.temperature, humidity: sensors.humidity };

      const current = deps.safetyLayer.getAppliedStates();
      const prediction = setpoints.predictiveControlEnabled
        ? yield* deps.advisor.predict(reading, current)
        : Option.none();

      const desired = decide(reading, setpoints, current, Option.getOrUndefined(prediction));

      yield* Effect.logDebug('Climate decision', { reading, desired, prediction: Option.getOrNull(prediction) });

      const now = yield* Clock.currentTimeMillis;
      const rateLimited = deps.lastActionAt !== null
        && now - deps.lastActionAt < deps.timingConfig.minActionIntervalInMs;

      // while rate limited only the safety shutoffs may switch anything
      const applied = yield* deps.safetyLayer.apply(rateLimited ? current : desired, reading, setpoints, now);

      if (!sameStates(applied, current)) {
        deps.lastActionAt = now;
      }

      yield* Effect.annotateCurrentSpan({ reading, desired, applied, rateLimited });

      if (setpoints.predictiveControlEnabled) {
        yield* deps.advisor.retrainIfDue();
      }
    }).pipe(
      deps.lock.withPermits(1),
      Effect.catchTag('MissingSensorData', (err) => deps.eventLogger.onCycleSkipped(err.message)),
      Effect.catchTags({
        BoardTransport: (err) => Effect.logWarning(`Climate cycle aborted: ${err.message}`),
        BoardTimeout: (err) => Effect.logWarning(`Climate cycle aborted: ${err.message}`),
        BoardProtocol: (err) => Effect.logWarning(`Climate cycle aborted: ${err.message}`),
        RelayCommandRejected: (err) => Effect.logWarning(`Climate cycle aborted: ${err.message}`, { relay: err.relay }),
      }),
      Effect.catchAllCause((cause) => Effect.logError('Climate cycle failed', cause).pipe(
        Effect.zipRight(deps.errorReporter.report(cause)),
      )),
      Effect.withSpan('climate-cycle'),
    );
  }
}
