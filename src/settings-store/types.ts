import { Context, Data, Effect } from "effect";

export class SettingsStoreError extends Data.TaggedError("SettingsStore")<{
  message: string;
  cause?: unknown;
}> {}

export type SettingsEntries = { readonly [key: string]: string };

/**
 * Durable string key/value storage. Values are parsed by the settings service, never here.
 */
export class SettingsStore extends Context.Tag("SettingsStore")<
  SettingsStore,
  {
    readonly getAll: () => Effect.Effect<SettingsEntries, SettingsStoreError>;
    // all entries land in one write
    readonly setMany: (entries: SettingsEntries) => Effect.Effect<void, SettingsStoreError>;
  }>
(){}

export type ISettingsStore = Context.Tag.Service<typeof SettingsStore>;
