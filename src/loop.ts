import { Duration, Effect, Fiber } from "effect";

/**
 * Whether a loop fiber is inside its body or sleeping until the next run.
 */
export type LoopActivity = {
  busy: boolean;
};

export const trackActivity = <A, E, R>(activity: LoopActivity, body: Effect.Effect<A, E, R>) =>
  Effect.sync(() => {
    activity.busy = true;
  }).pipe(
    Effect.zipRight(body),
    Effect.ensuring(Effect.sync(() => {
      activity.busy = false;
    })),
  );

/**
 * Stops a loop fiber that has been told to stop. A sleeping loop is interrupted right away;
 * a busy one gets `grace` to finish its run before it is interrupted.
 */
export const stopWithGrace = (
  fiber: Fiber.RuntimeFiber<void>,
  activity: LoopActivity,
  grace: Duration.DurationInput,
  name: string,
) => Effect.suspend(() => activity.busy
  ? Fiber.join(fiber).pipe(
    Effect.timeout(grace),
    Effect.catchTag('TimeoutException', () => Effect.logWarning(`${name} did not finish in time, interrupting`).pipe(
      Effect.zipRight(Fiber.interrupt(fiber)),
    )),
    Effect.asVoid,
  )
  : Fiber.interrupt(fiber).pipe(Effect.asVoid)
);
