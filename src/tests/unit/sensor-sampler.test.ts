import { describe, it, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Duration, Effect, Fiber, Layer, TestClock } from "effect";
import { BoardTimeoutError } from "../../actuator-gateway/errors.js";
import { ActuatorGateway, type IActuatorGateway } from "../../actuator-gateway/types.js";
import { HistoryLog, HistoryLogError, type IHistoryLog } from "../../history-log/types.js";
import { SensorSampler, SensorSamplerLayer } from "../../sensor-sampler.js";
import { mockGateway, mockHistoryLog } from "./support/mocks.js";

describe("SensorSampler", () => {
  let gateway: MockedObject<IActuatorGateway>;
  let historyLog: MockedObject<IHistoryLog>;

  const withSampler = <A, E>(effect: Effect.Effect<A, E, SensorSampler>) =>
    effect.pipe(
      Effect.provide(SensorSamplerLayer.pipe(
        Layer.provide(Layer.succeed(ActuatorGateway, gateway)),
        Layer.provide(Layer.succeed(HistoryLog, historyLog)),
      )),
    );

  beforeEach(() => {
    gateway = mockGateway();
    historyLog = mockHistoryLog();
  });

  it.effect("should record a complete sample", () =>
    withSampler(Effect.gen(function* () {
      const sampler = yield* SensorSampler;
      gateway.readClimate.mockReturnValue(Effect.succeed({ temperature: 21.5, humidity: 58 }));

      yield* sampler.sampleOnce();

      expect(historyLog.logSensorSample).toHaveBeenCalledTimes(1);
      expect(historyLog.logSensorSample).toHaveBeenCalledWith({ temperature: 21.5, humidity: 58 });
    }))
  );

  it.effect("should skip a sample with a missing value", () =>
    withSampler(Effect.gen(function* () {
      const sampler = yield* SensorSampler;
      gateway.readClimate.mockReturnValue(Effect.succeed({ temperature: 21.5, humidity: null }));

      yield* sampler.sampleOnce();

      expect(historyLog.logSensorSample).not.toHaveBeenCalled();
    }))
  );

  it.effect("should swallow board and history failures into warnings", () =>
    withSampler(Effect.gen(function* () {
      const sampler = yield* SensorSampler;

      gateway.readClimate.mockReturnValueOnce(Effect.fail(new BoardTimeoutError({ message: 'no reply', command: 'READ' })));
      yield* sampler.sampleOnce();

      historyLog.logSensorSample.mockReturnValueOnce(Effect.fail(new HistoryLogError({ message: 'disk full' })));
      yield* sampler.sampleOnce();

      expect(historyLog.logSensorSample).toHaveBeenCalledTimes(1);
      expect(historyLog.logSensorSample).toHaveBeenCalledWith({ temperature: 22, humidity: 60 });
    }))
  );

  it.effect("should keep sampling on its interval", () =>
    withSampler(Effect.gen(function* () {
      const sampler = yield* SensorSampler;

      const fiber = yield* sampler.start(Duration.minutes(1)).pipe(Effect.fork);
      yield* TestClock.adjust(Duration.minutes(3));
      yield* Fiber.interrupt(fiber);

      expect(historyLog.logSensorSample.mock.calls.length).toBeGreaterThanOrEqual(3);
    }))
  );
});
