import { Clock, Duration, Effect, Fiber, Schedule } from 'effect';
import type { IActuatorGateway } from './actuator-gateway/types.js';
import type { TriggeringMode } from './climate/types.js';
import type { IErrorReporter } from './error-reporter.js';
import { EventLogger } from './event-logger/index.js';
import type { IEventLogger } from './event-logger/types.js';
import type { IHistoryLog } from './history-log/types.js';
import { lightPhase, type LightPhase, type LightSchedule } from './light-schedule/schedule.js';
import { stopWithGrace, trackActivity, type LoopActivity } from './loop.js';
import type { IClimateSettings } from './settings/index.js';

type TimingConfig = {
  tickIntervalInMs: number;
  shutdownGraceInMs: number;
};

export type LightStatus = {
  readonly enabled: boolean;
  readonly running: boolean;
  readonly schedule: LightSchedule | null;
  readonly phase: LightPhase | null;
  // null until the light has been switched by this process
  readonly currentState: boolean | null;
};

export class LightScheduler {
  private enabled = false;

  private running = false;

  private lastApplied: boolean | null = null;

  private schedule: LightSchedule | null = null;

  private phase: LightPhase | null = null;

  private loopFiber: Fiber.RuntimeFiber<void> | null = null;

  private readonly activity: LoopActivity = { busy: false };

  // ticks from the loop and from callers, and manual switches, take turns on the light
  private readonly lock = Effect.unsafeMakeSemaphore(1);

  public constructor(
    private readonly gateway: IActuatorGateway,
    private readonly settings: IClimateSettings,
    private readonly historyLog: IHistoryLog,
    private readonly errorReporter: IErrorReporter,
    private readonly eventLogger: IEventLogger = new EventLogger(),
    private readonly timingConfig: TimingConfig = {
      tickIntervalInMs: 30 * 1000, // 30 seconds
      shutdownGraceInMs: 5 * 1000,
    },
  ) { }

  public start(): Effect.Effect<Fiber.RuntimeFiber<void>> {
    const deps = this;

    return Effect.gen(function* () {
      deps.running = true;

      const fiber = yield* Effect.repeat(
        trackActivity(deps.activity, deps.tick()).pipe(Effect.map(() => deps.running)),
        {
          schedule: Schedule.spaced(Duration.millis(deps.timingConfig.tickIntervalInMs)),
          while: (running) => running,
        }
      ).pipe(Effect.asVoid, Effect.fork);

      deps.loopFiber = fiber;

      return fiber;
    });
  }

  public enableSchedule() {
    const deps = this;

    return Effect.gen(function* () {
      deps.enabled = true;
      yield* deps.settings.setLightMode('schedule');
      yield* Effect.log('Light schedule enabled');
      yield* deps.tick();
    });
  }

  public disableSchedule() {
    this.enabled = false;

    return this.settings.setLightMode('manual').pipe(
      Effect.tap(() => Effect.log('Light schedule disabled')),
    );
  }

  /**
   * Persists the new schedule, then applies it right away instead of waiting for the next tick.
   */
  public setSchedule(schedule: LightSchedule) {
    const deps = this;

    return Effect.gen(function* () {
      yield* deps.settings.setLightSchedule(schedule);
      yield* Effect.log('Light schedule updated', { schedule });
      yield* deps.tick();
    });
  }

  /**
   * Operator override. Leaves schedule mode so the next tick does not undo it.
   */
  public switchManually(on: boolean) {
    const deps = this;

    return Effect.gen(function* () {
      if (deps.enabled) {
        yield* deps.disableSchedule();
      }

      yield* deps.switchLight(on, 'manual');
    }).pipe(deps.lock.withPermits(1));
  }

  public getStatus(): LightStatus {
    return {
      enabled: this.enabled,
      running: this.running,
      schedule: this.schedule,
      phase: this.phase,
      currentState: this.lastApplied,
    };
  }

  public shutdown() {
    const deps = this;

    return Effect.gen(function* () {
      deps.enabled = false;
      deps.running = false;

      const fiber = deps.loopFiber;
      if (fiber === null) {
        return;
      }
      deps.loopFiber = null;

      yield* stopWithGrace(fiber, deps.activity, Duration.millis(deps.timingConfig.shutdownGraceInMs), 'Light loop');
    });
  }

  public tick(): Effect.Effect<void> {
    const deps = this;

    return Effect.gen(function* () {
      if (!deps.enabled) {
        return;
      }

      const { lightSchedule } = yield* deps.settings.snapshot();
      const now = new Date(yield* Clock.currentTimeMillis);
      const phase = lightPhase(lightSchedule, now);

      deps.schedule = lightSchedule;
      deps.phase = phase;

      const desired = phase === 'scheduled-on';

      if (desired !== deps.lastApplied) {
        yield* deps.switchLight(desired, 'schedule');
      }
    }).pipe(
      deps.lock.withPermits(1),
      Effect.catchAll((err) => Effect.logWarning(`Light update failed, retrying next tick: ${err.message}`)),
      Effect.catchAllCause((cause) => Effect.logError('Light tick failed', cause).pipe(
        Effect.zipRight(deps.errorReporter.report(cause)),
      )),
      Effect.withSpan('light-tick'),
    );
  }

  private switchLight(on: boolean, mode: TriggeringMode) {
    const deps = this;

    return Effect.gen(function* () {
      yield* deps.gateway.setLight(on);
      deps.lastApplied = on;

      yield* deps.eventLogger.onActuatorSwitched('light', on, mode);
      yield* deps.historyLog.logActuatorChange({ actuator: 'light', state: on, mode }).pipe(
        Effect.catchAll((err) => Effect.logWarning(`Failed to record light change: ${err.message}`)),
      );
    });
  }
}
