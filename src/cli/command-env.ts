import type { Command } from "commander";
import { Effect, Option } from "effect";
import { getClientContext } from "../client/context";
import type { ClientContext } from "../core/interfaces/client-context";
import { InternalError } from "../core/types/errors";
import { getServerContext, type ServerContext } from "../server/context";

/**
 * What a command action sees once the pre-run hook has completed
 */
export interface CommandEnv {
  readonly command: Command;
  readonly client: ClientContext;
  readonly server: ServerContext;
}

export function commandEnv(command: Command): Effect.Effect<CommandEnv, InternalError> {
  const client = getClientContext(command);
  const server = getServerContext(command);
  if (Option.isNone(client) || Option.isNone(server)) {
    return Effect.fail(
      new InternalError({
        component: "cli",
        message: `command "${command.name()}" ran without the pre-run hook`,
      }),
    );
  }
  return Effect.succeed({ command, client: client.value, server: server.value });
}
