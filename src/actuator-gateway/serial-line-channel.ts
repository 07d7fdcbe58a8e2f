import { Effect, Option, Queue, type Scope } from "effect";
import { ReadlineParser, SerialPort } from "serialport";
import { BoardTransportError } from "./errors.js";
import type { LineChannel } from "./types.js";

// RP2040 USB CDC identifiers
const BOARD_VENDOR_ID = "2e8a";
const BOARD_PRODUCT_ID = "0005";

// replies that nobody is waiting for are dropped oldest first
const INCOMING_BUFFER_LINES = 64;

export type SerialLineChannelConfig = {
  readonly path: Option.Option<string>;
  readonly baudRate: number;
};

const discoverBoardPath = () => Effect.tryPromise({
  try: () => SerialPort.list(),
  catch: (err) => new BoardTransportError({ message: 'Could not enumerate serial ports', cause: err }),
}).pipe(
  Effect.flatMap((ports) => {
    const board = ports.find((port) =>
      port.vendorId?.toLowerCase() === BOARD_VENDOR_ID && port.productId?.toLowerCase() === BOARD_PRODUCT_ID
    );

    return board
      ? Effect.succeed(board.path)
      : Effect.fail(new BoardTransportError({ message: 'No board found on any serial port' }));
  }),
);

const openPort = (path: string, baudRate: number) => Effect.async<SerialPort, BoardTransportError>((resume) => {
  const port = new SerialPort({ path, baudRate }, (err) => {
    if (err) {
      resume(Effect.fail(new BoardTransportError({ message: `Could not open ${path}: ${err.message}`, cause: err })));
    } else {
      resume(Effect.succeed(port));
    }
  });
});

const closePort = (port: SerialPort) => Effect.async<void>((resume) => {
  if (!port.isOpen) {
    resume(Effect.void);
  } else {
    port.close(() => resume(Effect.void));
  }
});

export const makeSerialLineChannel = (
  config: SerialLineChannelConfig,
): Effect.Effect<LineChannel, BoardTransportError, Scope.Scope> => Effect.gen(function* () {
  const path = Option.isSome(config.path) ? config.path.value : yield* discoverBoardPath();
  const incoming = yield* Queue.sliding<string>(INCOMING_BUFFER_LINES);

  const port = yield* Effect.acquireRelease(openPort(path, config.baudRate), closePort);
  yield* Effect.logInfo(`Connected to board on ${path}`);

  const parser = port.pipe(new ReadlineParser({ delimiter: "\n" }));
  parser.on("data", (line: string) => {
    Queue.unsafeOffer(incoming, line);
  });

  return {
    incoming,
    write: (line: string) => Effect.async<void, BoardTransportError>((resume) => {
      port.write(line, (err) => {
        if (err) {
          resume(Effect.fail(new BoardTransportError({ message: `Write to ${path} failed: ${err.message}`, cause: err })));
        } else {
          resume(Effect.void);
        }
      });
    }),
  };
});
