import { FileSystem } from "@effect/platform";
import { Clock, Effect, Layer, Schema } from "effect";
import { AppConfig } from "../config.js";
import { HistoryLog, HistoryLogError, HistoryRecordSchema, type HistoryRecord, type IHistoryLog } from "./types.js";

const HistoryLineSchema = Schema.parseJson(HistoryRecordSchema);

const timestamp = Clock.currentTimeMillis.pipe(Effect.map((millis) => new Date(millis).toISOString()));

/**
 * Appends one JSON object per line. Earlier lines are never rewritten.
 */
export const makeJsonLinesHistoryLog = (fs: FileSystem.FileSystem, file: string): IHistoryLog => {
  const append = (record: HistoryRecord) => Schema.encode(HistoryLineSchema)(record).pipe(
    Effect.flatMap((line) => fs.writeFileString(file, `${line}\n`, { flag: 'a' })),
    Effect.mapError((cause) => new HistoryLogError({ message: `Could not append to history file ${file}`, cause })),
  );

  return {
    logActuatorChange: (change) => Effect.gen(function* () {
      yield* append({ type: 'actuator', timestamp: yield* timestamp, ...change });
    }),
    logSensorSample: ({ temperature, humidity }) => Effect.gen(function* () {
      yield* append({ type: 'sample', timestamp: yield* timestamp, temperature, humidity });
    }),
  };
};

export const JsonLinesHistoryLogLayer = Layer.effect(
  HistoryLog,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* AppConfig.storage.historyFile;

    return makeJsonLinesHistoryLog(fs, file);
  })
);
