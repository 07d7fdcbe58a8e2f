import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Duration, Effect, Fiber, Logger, LogLevel, Option } from "effect"
import { NodeSdk } from "@effect/opentelemetry"
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { ActuatorGateway } from "./actuator-gateway/types.js";
import { ClimateController } from "./climate-controller.js";
import { AppConfig } from "./config.js";
import { DutyCycleSafetyLayer } from "./duty-cycle/index.js";
import { ErrorReporter } from "./error-reporter.js";
import { EventLogger } from "./event-logger/index.js";
import { HistoryLog } from "./history-log/types.js";
import { serviceLayers } from "./layers.js";
import { LightScheduler } from "./light-scheduler.js";
import { PredictiveAdvisor } from "./predictive-advisor/index.js";
import { SensorSampler } from "./sensor-sampler.js";
import { ClimateSettings } from "./settings/index.js";

const isProd = process.env.NODE_ENV == 'production';

const SHUTDOWN_GRACE_MS = 5 * 1000;

const NodeSdkLive = NodeSdk.layer(() => ({
  resource: { serviceName: "grow-climate-controller" },
  spanProcessor: new SentrySpanProcessor()
}))

const program = Effect.gen(function*() {
  const sentryDsn = yield* AppConfig.sentryDsn;
  if (Option.isSome(sentryDsn)) {
    Sentry.init({
      dsn: sentryDsn.value,
      tracesSampleRate: 1.0,
    });
  }

  const gateway = yield* ActuatorGateway;
  const settings = yield* ClimateSettings;
  const historyLog = yield* HistoryLog;
  const errorReporter = yield* ErrorReporter;
  const sampler = yield* SensorSampler;
  const eventLogger = new EventLogger();

  yield* settings.initializeDefaults().pipe(
    Effect.catchAll((err) => Effect.logWarning(`Could not write default settings: ${err.message}`)),
  );

  const controller = new ClimateController(
    gateway,
    settings,
    new DutyCycleSafetyLayer(gateway, historyLog, eventLogger),
    yield* PredictiveAdvisor,
    errorReporter,
    eventLogger,
    {
      cycleIntervalInMs: (yield* AppConfig.timing.climateIntervalSeconds) * 1000,
      minActionIntervalInMs: (yield* AppConfig.timing.minActionIntervalSeconds) * 1000,
      shutdownGraceInMs: SHUTDOWN_GRACE_MS,
    },
  );

  const lightScheduler = new LightScheduler(
    gateway,
    settings,
    historyLog,
    errorReporter,
    eventLogger,
    {
      tickIntervalInMs: (yield* AppConfig.timing.lightIntervalSeconds) * 1000,
      shutdownGraceInMs: SHUTDOWN_GRACE_MS,
    },
  );

  yield* Effect.addFinalizer(() => Effect.all([controller.shutdown(), lightScheduler.shutdown()], { concurrency: 'unbounded', discard: true }));

  const climateFiber = yield* controller.start();
  const lightFiber = yield* lightScheduler.start();
  const samplerFiber = yield* sampler.start(Duration.seconds(yield* AppConfig.timing.sampleIntervalSeconds)).pipe(Effect.fork);

  // modes survive restarts
  const { mode, lightMode } = yield* settings.snapshot();
  if (mode === 'auto') {
    yield* controller.enable().pipe(Effect.catchAll((err) => Effect.logWarning(err.message)));
  }
  if (lightMode === 'schedule') {
    yield* lightScheduler.enableSchedule().pipe(Effect.catchAll((err) => Effect.logWarning(err.message)));
  }

  yield* Effect.log('Climate controller started', { mode, lightMode });

  yield* Fiber.joinAll([climateFiber, lightFiber, samplerFiber]);
}).pipe(
  // the loops stop before the board connection is released
  Effect.scoped,
  Effect.provide(serviceLayers),
  Effect.provide(NodeSdkLive),
  Effect.provide(NodeContext.layer),
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
