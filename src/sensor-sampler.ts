import { Context, Duration, Effect, Layer, Schedule } from 'effect';
import { ActuatorGateway } from './actuator-gateway/types.js';
import { HistoryLog } from './history-log/types.js';

export type SensorSampler = {
  // reads once and appends the sample; failures are logged, never raised
  readonly sampleOnce: () => Effect.Effect<void>;
  readonly start: (interval: Duration.DurationInput) => Effect.Effect<void>;
};

export const SensorSampler = Context.GenericTag<SensorSampler>('SensorSampler');

export const SensorSamplerLayer = Layer.effect(
  SensorSampler,
  Effect.gen(function* () {
    const gateway = yield* ActuatorGateway;
    const historyLog = yield* HistoryLog;

    const sampleOnce = () => Effect.gen(function* () {
      const { temperature, humidity } = yield* gateway.readClimate();

      if (temperature === null || humidity === null) {
        yield* Effect.logDebug('Incomplete sensor sample, not recorded', { temperature, humidity });
        return;
      }

      yield* historyLog.logSensorSample({ temperature, humidity });
    }).pipe(
      Effect.catchAll((err) => Effect.logWarning(`Sensor sampling failed: ${err.message}`)),
    );

    const start = (interval: Duration.DurationInput) =>
      Effect.repeat(sampleOnce(), Schedule.spaced(interval)).pipe(Effect.asVoid);

    return {
      sampleOnce,
      start,
    };
  })
);
