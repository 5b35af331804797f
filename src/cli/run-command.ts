import type { FileSystem } from "@effect/platform";
import { NodeFileSystem } from "@effect/platform-node";
import { Cause, Effect, Exit, Fiber, Option } from "effect";
import { InternalError } from "../core/types/errors";

/**
 * Run an effect from a commander action or hook.
 *
 * The promise rejects with the effect's own failure so callers see the tagged
 * error, not a fiber failure wrapper.
 */
export async function runCommandEffect<A, E>(
  effect: Effect.Effect<A, E, FileSystem.FileSystem>,
): Promise<A> {
  const exit = await Effect.runPromiseExit(effect.pipe(Effect.provide(NodeFileSystem.layer)));
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    throw failure.value;
  }
  throw new InternalError({
    component: "cli",
    message: Exit.isInterrupted(exit) ? "command was interrupted" : Cause.pretty(exit.cause),
    cause: Cause.squash(exit.cause),
  });
}

type SignalName = "SIGINT" | "SIGTERM";

/**
 * Run a long-lived effect until it completes or the process receives SIGINT
 * or SIGTERM. The first signal interrupts the effect and lets its finalizers
 * run; a second one exits immediately.
 */
export function untilInterrupted<A, E, R>(
  effect: Effect.Effect<A, E, R>,
  notify: (message: string) => void,
): Effect.Effect<Option.Option<A>, E, R> {
  return Effect.scoped(
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(effect);
      let signalCount = 0;

      function handler(signal: SignalName): void {
        signalCount += 1;
        const label = signal === "SIGINT" ? "Ctrl+C" : signal;

        if (signalCount === 1) {
          notify(`Received ${label}. Gracefully shutting down...`);
          Effect.runFork(Fiber.interrupt(fiber));
        } else {
          notify("Force exiting immediately. Some cleanup may be skipped.");
          process.exit(1);
        }
      }

      yield* Effect.acquireRelease(
        Effect.sync(() => {
          process.on("SIGINT", handler);
          process.on("SIGTERM", handler);
        }),
        () =>
          Effect.sync(() => {
            process.off("SIGINT", handler);
            process.off("SIGTERM", handler);
          }),
      );

      const exit = yield* Fiber.await(fiber);
      if (Exit.isSuccess(exit)) {
        return Option.some(exit.value);
      }
      if (Exit.isInterrupted(exit)) {
        return Option.none();
      }
      return yield* Effect.failCause(exit.cause);
    }),
  );
}
