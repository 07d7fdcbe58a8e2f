import { describe, it, vitest, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Duration, Effect, Option, TestClock } from "effect";
import { ALL_OFF } from "../../../climate/types.js";
import { makePredictiveAdvisor } from "../../../predictive-advisor/index.js";
import { buildFeatures } from "../../../predictive-advisor/features.js";
import type { ClimateModel, IModelTrainer } from "../../../predictive-advisor/types.js";
import type { IPredictiveAdvisor } from "../../../predictive-advisor/index.js";

const reading = { temperature: 20, humidity: 55 };

const modelReturning = (temperatureDelta: number, humidityDelta: number): ClimateModel => ({
  predict: () => ({ temperatureDelta, humidityDelta }),
});

// training runs on a daemon fiber; let it make progress until the model shows up
const waitForModel = (advisor: IPredictiveAdvisor) => Effect.gen(function* () {
  while (Option.isNone(yield* advisor.predict(reading, ALL_OFF))) {
    yield* Effect.yieldNow();
  }
});

describe("PredictiveAdvisor", () => {
  it("should encode actuator states and local time as features", () => {
    const features = buildFeatures(reading, { heater: true, humidifier: false, dehumidifier: true }, new Date(2024, 0, 15, 14, 45));

    expect(features).toEqual({
      temperature: 20,
      humidity: 55,
      heater: 1,
      humidifier: 0,
      dehumidifier: 1,
      hour: 14,
      minute: 45,
      dayOfWeek: 1,
    });
  });

  it.effect("should have no prediction without a model", () =>
    Effect.gen(function* () {
      const advisor = yield* makePredictiveAdvisor(Option.none());

      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(Option.none());
    })
  );

  it.effect("should predict with a loaded model over a 10 minute horizon", () =>
    Effect.gen(function* () {
      const advisor = yield* makePredictiveAdvisor(Option.none());
      const predict = vitest.fn(() => ({ temperatureDelta: 0.8, humidityDelta: -1.5 }));

      yield* advisor.loadModel({ predict });

      expect(yield* advisor.predict(reading, { ...ALL_OFF, heater: true })).toEqual(
        Option.some({ temperatureDelta: 0.8, humidityDelta: -1.5, horizonMinutes: 10 })
      );
      expect(predict).toHaveBeenCalledWith(expect.objectContaining({ temperature: 20, humidity: 55, heater: 1 }));
    })
  );

  it.effect("should fall back to no prediction when the model throws", () =>
    Effect.gen(function* () {
      const advisor = yield* makePredictiveAdvisor(Option.none());

      yield* advisor.loadModel({
        predict: () => {
          throw new Error('model file damaged');
        },
      });

      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(Option.none());
    })
  );

  it.effect("should fall back to no prediction when the model returns nothing", () =>
    Effect.gen(function* () {
      const advisor = yield* makePredictiveAdvisor(Option.none());
      const predict = vitest.fn<ClimateModel["predict"]>();

      yield* advisor.loadModel({ predict });

      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(Option.none());
      expect(predict).toHaveBeenCalledTimes(1);
    })
  );

  it.effect("should discard non-finite output", () =>
    Effect.gen(function* () {
      const advisor = yield* makePredictiveAdvisor(Option.none());

      yield* advisor.loadModel(modelReturning(Number.NaN, 1));

      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(Option.none());
    })
  );

  it.effect("should do nothing on retrain without a trainer", () =>
    Effect.gen(function* () {
      const advisor = yield* makePredictiveAdvisor(Option.none());

      yield* advisor.retrainIfDue();

      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(Option.none());
    })
  );

  it.effect("should swap in the trained model in the background", () =>
    Effect.gen(function* () {
      const trainer: MockedObject<IModelTrainer> = { train: vitest.fn() };
      trainer.train.mockReturnValue(Effect.succeed(modelReturning(0.5, 0)));
      const advisor = yield* makePredictiveAdvisor(Option.some(trainer));

      yield* advisor.retrainIfDue();
      yield* waitForModel(advisor);

      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(
        Option.some({ temperatureDelta: 0.5, humidityDelta: 0, horizonMinutes: 10 })
      );
    })
  );

  it.effect("should not wait for training and never run two at once", () =>
    Effect.gen(function* () {
      const trainer: MockedObject<IModelTrainer> = { train: vitest.fn() };
      trainer.train.mockReturnValue(Effect.never);
      const advisor = yield* makePredictiveAdvisor(Option.some(trainer));

      yield* advisor.retrainIfDue();
      yield* TestClock.adjust(Duration.minutes(15));
      yield* advisor.retrainIfDue();

      expect(trainer.train).toHaveBeenCalledTimes(1);
      expect(yield* advisor.predict(reading, ALL_OFF)).toEqual(Option.none());
    })
  );

  it.effect("should retrain only every 15 minutes", () =>
    Effect.gen(function* () {
      const trainer: MockedObject<IModelTrainer> = { train: vitest.fn() };
      trainer.train.mockReturnValue(Effect.succeed(modelReturning(0, 0)));
      const advisor = yield* makePredictiveAdvisor(Option.some(trainer));

      yield* advisor.retrainIfDue();
      yield* waitForModel(advisor);

      yield* TestClock.adjust(Duration.minutes(14));
      yield* advisor.retrainIfDue();
      expect(trainer.train).toHaveBeenCalledTimes(1);

      yield* TestClock.adjust(Duration.minutes(1));
      yield* advisor.retrainIfDue();
      expect(trainer.train).toHaveBeenCalledTimes(2);
    })
  );
});
