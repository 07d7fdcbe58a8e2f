import { Duration, Effect, Either, Queue, Schema } from "effect";
import { BoardProtocolError, BoardTimeoutError, type BoardTransportError } from "./errors.js";
import { BoardErrorResponseSchema, type BoardCommand } from "./schema.js";
import type { LineChannel } from "./types.js";

export type BoardLinkConfig = {
  readonly requestTimeoutMs: number;
};

export type BoardLink = {
  readonly request: <A, I>(
    command: BoardCommand,
    response: Schema.Schema<A, I>,
  ) => Effect.Effect<A, BoardTransportError | BoardTimeoutError | BoardProtocolError>;
};

const decodeBoardError = Schema.decodeUnknownEither(Schema.parseJson(BoardErrorResponseSchema));

const decodeResponse = <A, I>(line: string, schema: Schema.Schema<A, I>): Effect.Effect<A, BoardProtocolError> => {
  const boardError = decodeBoardError(line);
  if (Either.isRight(boardError)) {
    return Effect.fail(new BoardProtocolError({ message: `Board reported an error: ${boardError.right.error}`, response: line }));
  }

  return Schema.decodeUnknown(Schema.parseJson(schema))(line).pipe(
    Effect.catchTag('ParseError', (err) => Effect.fail(
      new BoardProtocolError({ message: `Unrecognized response from board: ${err.message}`, response: line })
    )),
  );
};

/**
 * Request/response over a line channel. One exchange is in flight at a time, and any
 * line left over from an earlier (timed out) exchange is dropped before the next request.
 */
export const makeBoardLink = (channel: LineChannel, config: BoardLinkConfig) => Effect.gen(function* () {
  const lock = yield* Effect.makeSemaphore(1);

  const exchange = (command: BoardCommand) => Effect.gen(function* () {
    yield* Queue.takeAll(channel.incoming);
    yield* channel.write(`${JSON.stringify(command)}\n`);

    return yield* Queue.take(channel.incoming).pipe(
      Effect.timeout(Duration.millis(config.requestTimeoutMs)),
      Effect.catchTag('TimeoutException', () => Effect.fail(new BoardTimeoutError({
        command: command.command,
        message: `Board did not answer '${command.command}' within ${config.requestTimeoutMs}ms`,
      }))),
    );
  });

  const link: BoardLink = {
    request: (command, response) => lock.withPermits(1)(exchange(command)).pipe(
      Effect.flatMap((line) => decodeResponse(line.trim(), response)),
      Effect.tap(() => Effect.annotateCurrentSpan({ command: command.command })),
      Effect.withSpan('board-command'),
    ),
  };

  return link;
});
