import { Duration, Effect, Layer } from "effect";
import type { ActuatorStates } from "../climate/types.js";
import { AppConfig } from "../config.js";
import { makeBoardLink, type BoardLink } from "./board-link.js";
import { BoardProtocolError, RelayCommandRejectedError } from "./errors.js";
import {
  GetRelaysResponseSchema,
  PingResponseSchema,
  ReadAllResponseSchema,
  SetRelayResponseSchema,
  type RelayName,
} from "./schema.js";
import { makeSerialLineChannel } from "./serial-line-channel.js";
import { ActuatorGateway, type IActuatorGateway } from "./types.js";

// the board resets when the port opens and needs a moment before it answers
const BOARD_BOOT_TIME = Duration.seconds(2);

export const makeBoardActuatorGateway = (link: BoardLink): IActuatorGateway => {
  const setRelay = (relay: RelayName, state: boolean) => link.request(
    { command: 'set_relay', relay, state },
    SetRelayResponseSchema,
  ).pipe(
    Effect.flatMap((response): Effect.Effect<void, BoardProtocolError | RelayCommandRejectedError> => {
      // a late answer to an earlier, timed-out command
      if (response.relay !== relay || response.state !== state) {
        return Effect.fail(new BoardProtocolError({
          message: `Board answered set_relay ${response.relay}=${response.state} while ${relay}=${state} was requested`,
          response: JSON.stringify(response),
        }));
      }

      return response.success
        ? Effect.void
        : Effect.fail(new RelayCommandRejectedError({ relay, state }));
    }),
  );

  const setActuators = (states: ActuatorStates) => {
    // relays switching off go first so that two opposing devices are never on at the same time
    const ordered = (['humidifier', 'dehumidifier', 'heater'] as const)
      .map((relay) => ({ relay, state: states[relay] }))
      .sort((a, b) => Number(a.state) - Number(b.state));

    return Effect.forEach(ordered, ({ relay, state }) => setRelay(relay, state), { discard: true });
  };

  return {
    readClimate: () => link.request({ command: 'read_all' }, ReadAllResponseSchema).pipe(
      Effect.map(({ temperature, humidity }) => ({ temperature, humidity })),
    ),
    setActuators,
    getActuatorStates: () => link.request({ command: 'get_relays' }, GetRelaysResponseSchema).pipe(
      Effect.map(({ relays }) => relays),
    ),
    setLight: (on: boolean) => setRelay('light', on),
  };
};

export const pingBoard = (link: BoardLink) => link.request({ command: 'ping' }, PingResponseSchema).pipe(
  Effect.flatMap((response) => response.status === 'ok'
    ? Effect.logInfo(`Board answered ping${response.board ? ` (${response.board})` : ''}`)
    : Effect.fail(new BoardProtocolError({ message: `Board ping returned status '${response.status}'` }))
  ),
);

export const BoardActuatorGatewayLayer = Layer.scoped(
  ActuatorGateway,
  Effect.gen(function* () {
    const config = AppConfig.board;

    const channel = yield* makeSerialLineChannel({
      path: yield* config.serialPath,
      baudRate: yield* config.baudRate,
    });
    const link = yield* makeBoardLink(channel, { requestTimeoutMs: yield* config.requestTimeoutMs });

    yield* Effect.sleep(BOARD_BOOT_TIME);
    yield* pingBoard(link);

    return makeBoardActuatorGateway(link);
  })
);
