import type { Command } from "commander";
import { Effect, Option } from "effect";
import path from "node:path";
import { z } from "zod";
import type { ClientContext, ClientFlag } from "../core/interfaces/client-context";
import { KEYRING_BACKENDS } from "../core/interfaces/keyring";
import type { TxConfig } from "../core/interfaces/tx-config";
import { FlagParseError } from "../core/types/errors";
import { expandHome } from "../core/utils/paths";
import { nodeUriSchema } from "../config/schemas";
import { CLIENT_FLAGS, lookupFlag } from "./flags";

/**
 * Client context construction and per-command storage
 */

export function makeClientContext(homeDir: string, txConfig: TxConfig): ClientContext {
  return {
    homeDir,
    chainId: "",
    keyringBackend: "test",
    keyringDir: "",
    nodeUri: "tcp://localhost:26657",
    outputFormat: "text",
    broadcastMode: "sync",
    fromName: "",
    offline: false,
    flagOverrides: [],
    txConfig,
  };
}

/**
 * Directory the keyring of a context lives in
 */
export function keyringDirectory(ctx: ClientContext): string {
  return ctx.keyringDir || ctx.homeDir;
}

interface FlagBinding {
  readonly flag: ClientFlag;
  readonly apply: (ctx: ClientContext, command: Command) => Effect.Effect<ClientContext, FlagParseError>;
}

function bind<T>(
  flag: ClientFlag,
  schema: z.ZodType<T>,
  isUnset: (ctx: ClientContext) => boolean,
  update: (ctx: ClientContext, value: T) => ClientContext,
): FlagBinding {
  return {
    flag,
    apply: (ctx, command) => {
      const found = lookupFlag(command, CLIENT_FLAGS[flag].attribute);
      if (!found || found.value === undefined || !(found.changed || isUnset(ctx))) {
        return Effect.succeed(ctx);
      }
      const result = schema.safeParse(found.value);
      if (!result.success) {
        return Effect.fail(
          new FlagParseError({
            flag,
            value: found.value,
            message: `invalid value for --${flag}: ${result.error.issues[0]?.message ?? "invalid value"}`,
            suggestion: `Run with --help to see accepted values for --${flag}`,
          }),
        );
      }
      const updated = update(ctx, result.data);
      return Effect.succeed(
        found.changed && !updated.flagOverrides.includes(flag)
          ? { ...updated, flagOverrides: [...updated.flagOverrides, flag] }
          : updated,
      );
    },
  };
}

const nonEmpty = z.string().trim().min(1, "must not be empty");

const FLAG_BINDINGS: readonly FlagBinding[] = [
  bind(
    "home",
    nonEmpty,
    (ctx) => ctx.homeDir === "",
    (ctx, value) => ({ ...ctx, homeDir: path.resolve(expandHome(value)) }),
  ),
  bind(
    "chain-id",
    z.string(),
    (ctx) => ctx.chainId === "",
    (ctx, value) => ({ ...ctx, chainId: value }),
  ),
  bind(
    "keyring-backend",
    z.enum(["memory", "test"], {
      errorMap: () => ({ message: `expected one of ${KEYRING_BACKENDS.join(", ")}` }),
    }),
    () => false,
    (ctx, value) => ({ ...ctx, keyringBackend: value }),
  ),
  bind(
    "keyring-dir",
    nonEmpty,
    (ctx) => ctx.keyringDir === "",
    (ctx, value) => ({ ...ctx, keyringDir: path.resolve(expandHome(value)) }),
  ),
  bind(
    "node",
    nodeUriSchema,
    () => false,
    (ctx, value) => ({ ...ctx, nodeUri: value }),
  ),
  bind(
    "output",
    z.enum(["text", "json"], { errorMap: () => ({ message: "expected one of text, json" }) }),
    () => false,
    (ctx, value) => ({ ...ctx, outputFormat: value }),
  ),
  bind(
    "from",
    nonEmpty,
    (ctx) => ctx.fromName === "",
    (ctx, value) => ({ ...ctx, fromName: value }),
  ),
  bind(
    "offline",
    z.boolean(),
    () => false,
    (ctx, value) => ({ ...ctx, offline: value }),
  ),
];

/**
 * Apply the persistent flags of `command` to a client context.
 *
 * A flag is applied when it was set explicitly, or when the context has no
 * value for it yet. Explicit flags are recorded in `flagOverrides` so config
 * files loaded afterwards leave them alone.
 */
export function readPersistentCommandFlags(
  ctx: ClientContext,
  command: Command,
): Effect.Effect<ClientContext, FlagParseError> {
  return Effect.reduce(FLAG_BINDINGS, ctx, (current, binding) => binding.apply(current, command));
}

const clientContexts = new WeakMap<Command, ClientContext>();

/**
 * Install a client context on a command. Subcommands see it through
 * {@link getClientContext} unless they carry their own.
 */
export function setCommandClientContext(ctx: ClientContext, command: Command): Effect.Effect<void> {
  return Effect.sync(() => {
    clientContexts.set(command, ctx);
  });
}

/**
 * The client context of a command or its nearest ancestor
 */
export function getClientContext(command: Command): Option.Option<ClientContext> {
  for (let current: Command | null = command; current; current = current.parent) {
    const ctx = clientContexts.get(current);
    if (ctx) {
      return Option.some(ctx);
    }
  }
  return Option.none();
}
