import { Schema } from "effect";

export const RelayNameSchema = Schema.Literal("heater", "humidifier", "dehumidifier", "light");

export type RelayName = typeof RelayNameSchema.Type

export const BoardCommandSchema = Schema.Union(
  Schema.Struct({ command: Schema.Literal("read_all") }),
  Schema.Struct({ command: Schema.Literal("get_relays") }),
  Schema.Struct({ command: Schema.Literal("ping") }),
  Schema.Struct({
    command: Schema.Literal("set_relay"),
    relay: RelayNameSchema,
    state: Schema.Boolean,
  }),
);

export type BoardCommand = typeof BoardCommandSchema.Type

export const RelayStatesSchema = Schema.Struct({
  heater: Schema.Boolean,
  humidifier: Schema.Boolean,
  dehumidifier: Schema.Boolean,
  light: Schema.Boolean,
});

export type RelayStates = typeof RelayStatesSchema.Type

export const ReadAllResponseSchema = Schema.Struct({
  temperature: Schema.NullOr(Schema.Number),
  humidity: Schema.NullOr(Schema.Number),
  relays: Schema.optional(RelayStatesSchema),
  status: Schema.String,
});

export type ReadAllResponse = typeof ReadAllResponseSchema.Type

export const SetRelayResponseSchema = Schema.Struct({
  command: Schema.Literal("set_relay"),
  relay: Schema.String,
  state: Schema.Boolean,
  success: Schema.Boolean,
});

export const GetRelaysResponseSchema = Schema.Struct({
  relays: RelayStatesSchema,
  status: Schema.String,
});

export const PingResponseSchema = Schema.Struct({
  status: Schema.String,
  board: Schema.optional(Schema.String),
});

export const BoardErrorResponseSchema = Schema.Struct({
  error: Schema.String,
});
