import { Data } from "effect";

export class BoardTransportError extends Data.TaggedError("BoardTransport")<{
  message: string;
  cause?: unknown;
}> {}

export class BoardTimeoutError extends Data.TaggedError("BoardTimeout")<{
  message: string;
  command: string;
}> {}

export class BoardProtocolError extends Data.TaggedError("BoardProtocol")<{
  message: string;
  response?: string;
}> {}

export class RelayCommandRejectedError extends Data.TaggedError("RelayCommandRejected")<{
  relay: string;
  state: boolean;
}> {
  public override readonly message = 'Board rejected the relay command.';
}

export type GatewayError = BoardTransportError | BoardTimeoutError | BoardProtocolError | RelayCommandRejectedError;
