import { Context, Data, Effect } from "effect";

/**
 * Model inputs. Actuator states are 0/1 so numeric models can take them as they are.
 */
export type ClimateFeatures = {
  readonly temperature: number;
  readonly humidity: number;
  readonly heater: 0 | 1;
  readonly humidifier: 0 | 1;
  readonly dehumidifier: 0 | 1;
  readonly hour: number;
  readonly minute: number;
  readonly dayOfWeek: number; // 0 = Sunday
};

export type ClimateDeltas = {
  readonly temperatureDelta: number;
  readonly humidityDelta: number;
};

/**
 * A trained model. `predict` is synchronous and may throw.
 */
export type ClimateModel = {
  readonly predict: (features: ClimateFeatures) => ClimateDeltas;
};

export class ModelTrainingError extends Data.TaggedError("ModelTraining")<{
  message: string;
  cause?: unknown;
}> {}

export class ModelTrainer extends Context.Tag("ModelTrainer")<
  ModelTrainer,
  {
    readonly train: () => Effect.Effect<ClimateModel, ModelTrainingError>;
  }>
(){}

export type IModelTrainer = Context.Tag.Service<typeof ModelTrainer>;
