import { Clock, Context, Effect, Layer, Option, Ref } from "effect";
import type { ActuatorStates, ClimateReading, Prediction } from "../climate/types.js";
import { MINUTE_MS } from "../duty-cycle/types.js";
import { buildFeatures } from "./features.js";
import { ModelTrainer, type ClimateModel, type IModelTrainer } from "./types.js";

export const PREDICTION_HORIZON_MINUTES = 10;
export const RETRAIN_INTERVAL_MS = 15 * MINUTE_MS;

export class PredictiveAdvisor extends Context.Tag("PredictiveAdvisor")<
  PredictiveAdvisor,
  {
    /**
     * Expected change over the next {@link PREDICTION_HORIZON_MINUTES} minutes, or none
     * when no usable prediction exists. Never fails.
     */
    readonly predict: (reading: ClimateReading, states: ActuatorStates) => Effect.Effect<Option.Option<Prediction>>;
    /**
     * Starts a training run in the background when one is due. Returns without waiting for it.
     */
    readonly retrainIfDue: () => Effect.Effect<void>;
    readonly loadModel: (model: ClimateModel) => Effect.Effect<void>;
  }>
(){}

export type IPredictiveAdvisor = Context.Tag.Service<typeof PredictiveAdvisor>;

export const makePredictiveAdvisor = (trainer: Option.Option<IModelTrainer>) => Effect.gen(function* () {
  const model = yield* Ref.make(Option.none<ClimateModel>());
  const lastAttemptAt = yield* Ref.make<number | null>(null);
  const training = yield* Ref.make(false);

  const predict = (reading: ClimateReading, states: ActuatorStates) => Effect.gen(function* () {
    const current = yield* Ref.get(model);

    if (Option.isNone(current)) {
      return Option.none<Prediction>();
    }

    const features = buildFeatures(reading, states, new Date(yield* Clock.currentTimeMillis));

    return yield* Effect.try(() => {
      const { temperatureDelta, humidityDelta } = current.value.predict(features);

      return Number.isFinite(temperatureDelta) && Number.isFinite(humidityDelta)
        ? Option.some<Prediction>({ temperatureDelta, humidityDelta, horizonMinutes: PREDICTION_HORIZON_MINUTES })
        : Option.none<Prediction>();
    }).pipe(
      Effect.catchAll((err) => Effect.logWarning('Prediction failed, using reactive control for this cycle', err).pipe(
        Effect.as(Option.none<Prediction>())
      )),
    );
  });

  const runTraining = (available: IModelTrainer) => available.train().pipe(
    Effect.ensuring(Ref.set(training, false)),
    Effect.flatMap((trained) => Ref.set(model, Option.some(trained))),
    Effect.zipRight(Effect.logInfo('Climate model retrained')),
    Effect.catchAll((err) => Effect.logWarning(`Model training failed: ${err.message}`)),
  );

  const retrainIfDue = () => Option.match(trainer, {
    onNone: () => Effect.void,
    onSome: (available) => Effect.gen(function* () {
      const now = yield* Clock.currentTimeMillis;
      const last = yield* Ref.get(lastAttemptAt);

      if (last !== null && now - last < RETRAIN_INTERVAL_MS) {
        return;
      }

      const started = yield* Ref.modify(training, (busy) => [!busy, true] as const);

      if (!started) {
        return;
      }

      yield* Ref.set(lastAttemptAt, now);
      yield* runTraining(available).pipe(Effect.forkDaemon);
    }),
  });

  const advisor: IPredictiveAdvisor = {
    predict,
    retrainIfDue,
    loadModel: (loaded) => Ref.set(model, Option.some(loaded)),
  };

  return advisor;
});

// without a ModelTrainer in context the advisor stays empty until a model is loaded
export const PredictiveAdvisorLayer = Layer.effect(
  PredictiveAdvisor,
  Effect.serviceOption(ModelTrainer).pipe(Effect.flatMap(makePredictiveAdvisor)),
);
