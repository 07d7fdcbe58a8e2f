import { Context, Effect, Queue } from "effect";
import type { ActuatorStates } from "../climate/types.js";
import type { BoardTransportError, GatewayError } from "./errors.js";
import type { RelayStates } from "./schema.js";

export type SensorReading = {
  readonly temperature: number | null;
  readonly humidity: number | null;
};

export class ActuatorGateway extends Context.Tag("ActuatorGateway")<
  ActuatorGateway,
  {
    readonly readClimate: () => Effect.Effect<SensorReading, GatewayError>;
    readonly setActuators: (states: ActuatorStates) => Effect.Effect<void, GatewayError>;
    readonly getActuatorStates: () => Effect.Effect<RelayStates, GatewayError>;
    readonly setLight: (on: boolean) => Effect.Effect<void, GatewayError>;
  }>
(){}

export type IActuatorGateway = Context.Tag.Service<typeof ActuatorGateway>;

/**
 * A bidirectional, newline-delimited text link to the board.
 */
export type LineChannel = {
  readonly write: (line: string) => Effect.Effect<void, BoardTransportError>;
  readonly incoming: Queue.Dequeue<string>;
};
