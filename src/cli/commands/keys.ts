import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { keyringDirectory } from "../../client/context";
import type { KeyRecord, Keyring } from "../../core/interfaces/keyring";
import type { KeyringError } from "../../core/types/errors";
import { makeKeyring } from "../../services/keyring";
import type { CommandEnv } from "../command-env";
import { printOutput } from "../print";

/**
 * CLI commands for key management
 */

function openKeyring(env: CommandEnv): Effect.Effect<Keyring, never, FileSystem.FileSystem> {
  return makeKeyring(env.client.keyringBackend, keyringDirectory(env.client));
}

export function formatKey(key: KeyRecord): string {
  return [`- name: ${key.name}`, `  address: ${key.address}`, `  pubkey: ${key.publicKey}`].join("\n");
}

export function keysAddCommand(
  env: CommandEnv,
  name: string,
): Effect.Effect<void, KeyringError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const keyring = yield* openKeyring(env);
    const key = yield* keyring.add(name);
    yield* env.server.logger.debug("key added", { name, backend: keyring.backend });
    printOutput(env.command, env.client.outputFormat, key, () => formatKey(key));
  });
}

export function keysListCommand(
  env: CommandEnv,
): Effect.Effect<void, KeyringError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const keyring = yield* openKeyring(env);
    const keys = yield* keyring.list();
    printOutput(env.command, env.client.outputFormat, keys, () =>
      keys.length === 0 ? "No keys found" : keys.map(formatKey).join("\n"),
    );
  });
}

export function keysShowCommand(
  env: CommandEnv,
  name: string,
  addressOnly: boolean,
): Effect.Effect<void, KeyringError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const keyring = yield* openKeyring(env);
    const key = yield* keyring.get(name);
    if (addressOnly) {
      printOutput(env.command, env.client.outputFormat, { address: key.address }, () => key.address);
      return;
    }
    printOutput(env.command, env.client.outputFormat, key, () => formatKey(key));
  });
}

export function keysDeleteCommand(
  env: CommandEnv,
  name: string,
): Effect.Effect<void, KeyringError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const keyring = yield* openKeyring(env);
    yield* keyring.remove(name);
    printOutput(env.command, env.client.outputFormat, { deleted: name }, () => `Key "${name}" deleted`);
  });
}
