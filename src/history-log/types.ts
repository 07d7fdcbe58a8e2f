import { Context, Data, Effect, Schema } from "effect";
import type { ClimateReading } from "../climate/types.js";

export class HistoryLogError extends Data.TaggedError("HistoryLog")<{
  message: string;
  cause?: unknown;
}> {}

export const ActuatorChangeRecordSchema = Schema.Struct({
  type: Schema.Literal("actuator"),
  timestamp: Schema.String,
  actuator: Schema.Literal("heater", "humidifier", "dehumidifier", "light"),
  state: Schema.Boolean,
  mode: Schema.Literal("auto", "schedule", "manual"),
});

export const SensorSampleRecordSchema = Schema.Struct({
  type: Schema.Literal("sample"),
  timestamp: Schema.String,
  temperature: Schema.Number,
  humidity: Schema.Number,
});

export const HistoryRecordSchema = Schema.Union(ActuatorChangeRecordSchema, SensorSampleRecordSchema);

export type ActuatorChangeRecord = Schema.Schema.Type<typeof ActuatorChangeRecordSchema>;
export type HistoryRecord = Schema.Schema.Type<typeof HistoryRecordSchema>;

export type ActuatorChange = Omit<ActuatorChangeRecord, "type" | "timestamp">;

export class HistoryLog extends Context.Tag("HistoryLog")<
  HistoryLog,
  {
    readonly logActuatorChange: (change: ActuatorChange) => Effect.Effect<void, HistoryLogError>;
    readonly logSensorSample: (reading: ClimateReading) => Effect.Effect<void, HistoryLogError>;
  }>
(){}

export type IHistoryLog = Context.Tag.Service<typeof HistoryLog>;
