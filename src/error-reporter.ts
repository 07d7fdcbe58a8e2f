import { Cause, Context, Effect, Layer } from "effect";
import * as Sentry from "@sentry/node";

export class ErrorReporter extends Context.Tag("ErrorReporter")<
  ErrorReporter,
  {
    readonly report: (cause: Cause.Cause<unknown>) => Effect.Effect<void>;
  }>
(){}

export type IErrorReporter = Context.Tag.Service<typeof ErrorReporter>;

// a no-op until Sentry.init has been called with a DSN
export const SentryErrorReporterLayer = Layer.succeed(ErrorReporter, {
  report: (cause) => Effect.sync(() => {
    if (Sentry.isInitialized()) {
      Sentry.captureException(Cause.squash(cause));
    }
  }),
});
