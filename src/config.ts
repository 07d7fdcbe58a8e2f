import { Config as EffectConfig } from "effect";


export const AppConfig = {
  board: {
    serialPath: EffectConfig.option(EffectConfig.string("BOARD_SERIAL_PATH")),
    baudRate: EffectConfig.integer("BOARD_BAUD_RATE").pipe(
      EffectConfig.withDefault(115200)
    ),
    requestTimeoutMs: EffectConfig.integer("BOARD_REQUEST_TIMEOUT_MS").pipe(
      EffectConfig.withDefault(2000)
    ),
  },

  storage: {
    settingsFile: EffectConfig.string("SETTINGS_FILE").pipe(
      EffectConfig.withDefault("greenhouse-settings.json")
    ),
    historyFile: EffectConfig.string("HISTORY_FILE").pipe(
      EffectConfig.withDefault("greenhouse-history.jsonl")
    ),
  },

  timing: {
    climateIntervalSeconds: EffectConfig.number("CLIMATE_INTERVAL_SECONDS").pipe(
      EffectConfig.withDefault(10)
    ),
    lightIntervalSeconds: EffectConfig.number("LIGHT_INTERVAL_SECONDS").pipe(
      EffectConfig.withDefault(30)
    ),
    sampleIntervalSeconds: EffectConfig.number("SAMPLE_INTERVAL_SECONDS").pipe(
      EffectConfig.withDefault(30)
    ),
    minActionIntervalSeconds: EffectConfig.number("MIN_ACTION_INTERVAL_SECONDS").pipe(
      EffectConfig.withDefault(60)
    ),
  },

  sentryDsn: EffectConfig.option(EffectConfig.string("SENTRY_DSN")),
};
