import { NodeFileSystem } from "@effect/platform-node";
import { Effect } from "effect";
import { keyringDirectory, makeClientContext } from "../client/context";
import { configs, provide, type DependencyConfig, type Lookup } from "../core/di/container";
import { AppConfigTag } from "../core/interfaces/app-config";
import { ChainSpecTag, type ChainSpec } from "../core/interfaces/chain-spec";
import { ClientContextTag, type ClientContext } from "../core/interfaces/client-context";
import { KeyringTag, type Keyring } from "../core/interfaces/keyring";
import { NodeInfoTag } from "../core/interfaces/node";
import { SettingsStoreTag } from "../core/interfaces/settings";
import { TxConfigTag, type TxConfig } from "../core/interfaces/tx-config";
import type { AppConfig } from "../core/types/config";
import { ConfigurationError, type InternalError, type ResolutionError } from "../core/types/errors";
import { overlay } from "../core/utils/json";
import { camelCaseKeys, filePath } from "../config/keys";
import { appConfigSchema } from "../config/schemas";
import { makeKeyring } from "../services/keyring";
import { defaultAppConfig } from "./app-config";
import { CHAIN_SPEC_ENV, chainSpecByName } from "./chain-spec";

/**
 * Providers the node builder registers for every node
 */

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

/**
 * JSON transaction encoding for nodes without a transaction module
 */
export const noopTxConfig: TxConfig = {
  name: "noop",
  signModes: [],
  encode: (tx) => textEncoder.encode(JSON.stringify(tx ?? null)),
  decode: (bytes) => JSON.parse(textDecoder.decode(bytes)),
};

export function provideNoopTxConfig(_lookup: Lookup): Effect.Effect<TxConfig> {
  return Effect.succeed(noopTxConfig);
}

/**
 * Base client context. The home directory comes from the `home` setting, or
 * the node's default home.
 */
export function provideClientContext(lookup: Lookup): Effect.Effect<ClientContext, ResolutionError> {
  return Effect.gen(function* () {
    const txConfig = yield* lookup(TxConfigTag);
    const info = yield* lookup(NodeInfoTag);
    const settings = yield* lookup(SettingsStoreTag);
    return makeClientContext(settings.getString("home", info.defaultHome), txConfig);
  });
}

export function provideKeyring(lookup: Lookup): Effect.Effect<Keyring, ResolutionError> {
  return lookup(ClientContextTag).pipe(
    Effect.flatMap((ctx) => makeKeyring(ctx.keyringBackend, keyringDirectory(ctx))),
    Effect.provide(NodeFileSystem.layer),
  );
}

/**
 * App config from the settings store layered over the defaults
 */
export function provideAppConfig(
  lookup: Lookup,
): Effect.Effect<AppConfig, ResolutionError | ConfigurationError> {
  return Effect.flatMap(lookup(SettingsStoreTag), (settings) => {
    const result = appConfigSchema.safeParse(
      overlay(defaultAppConfig(), camelCaseKeys(settings.snapshot())),
    );
    if (result.success) {
      return Effect.succeed(result.data);
    }
    const [issue] = result.error.issues;
    return Effect.fail(
      new ConfigurationError({
        file: "settings",
        field: issue ? filePath(issue.path, "kebab") : "",
        message: issue?.message ?? "invalid app configuration",
      }),
    );
  });
}

export function provideChainSpec(_lookup: Lookup): Effect.Effect<ChainSpec, InternalError> {
  return Effect.suspend(() => chainSpecByName(process.env[CHAIN_SPEC_ENV]));
}

/**
 * Registrations of the default providers
 */
export function defaultProviders(): DependencyConfig {
  return configs(
    provide(TxConfigTag, provideNoopTxConfig),
    provide(ClientContextTag, provideClientContext),
    provide(KeyringTag, provideKeyring),
    provide(AppConfigTag, provideAppConfig),
    provide(ChainSpecTag, provideChainSpec),
  );
}
