import { FileSystem } from "@effect/platform";
import { Effect, Layer, Schema } from "effect";
import { AppConfig } from "../config.js";
import { SettingsStore, SettingsStoreError, type ISettingsStore, type SettingsEntries } from "./types.js";

const SettingsFileSchema = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.String }),
  { space: 2 },
);

/**
 * Settings kept as one JSON object of strings. The file is read on every access so edits
 * made by other processes are picked up, and replaced through a rename so readers never
 * see a half-written file.
 */
export const makeJsonFileSettingsStore = (fs: FileSystem.FileSystem, file: string) => Effect.gen(function* () {
  const lock = yield* Effect.makeSemaphore(1);

  const read = () => fs.exists(file).pipe(
    Effect.flatMap((exists): Effect.Effect<SettingsEntries, unknown> => exists
      ? fs.readFileString(file).pipe(Effect.flatMap(Schema.decodeUnknown(SettingsFileSchema)))
      : Effect.succeed({})
    ),
    Effect.mapError((cause) => new SettingsStoreError({ message: `Could not read settings from ${file}`, cause })),
  );

  const write = (entries: SettingsEntries) => Schema.encode(SettingsFileSchema)(entries).pipe(
    Effect.flatMap((text) => fs.writeFileString(`${file}.tmp`, text)),
    Effect.flatMap(() => fs.rename(`${file}.tmp`, file)),
    Effect.mapError((cause) => new SettingsStoreError({ message: `Could not write settings to ${file}`, cause })),
  );

  const store: ISettingsStore = {
    getAll: read,
    setMany: (entries) => lock.withPermits(1)(
      read().pipe(Effect.flatMap((current) => write({ ...current, ...entries })))
    ),
  };

  return store;
});

export const JsonFileSettingsStoreLayer = Layer.effect(
  SettingsStore,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* AppConfig.storage.settingsFile;

    return yield* makeJsonFileSettingsStore(fs, file);
  })
);
