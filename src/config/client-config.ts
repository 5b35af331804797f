import type { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import path from "node:path";
import type { ClientContext } from "../core/interfaces/client-context";
import type { ClientConfig, ConfigTemplate } from "../core/types/config";
import type { ConfigurationError } from "../core/types/errors";
import { configDirectory, loadOrWriteConfig } from "./files";
import { clientConfigSchema } from "./schemas";

export const CLIENT_CONFIG_FILE = "client.toml";

/**
 * Merge `<home>/config/client.toml` into a client context, writing the file
 * from the template when it does not exist. Fields set by a flag keep the
 * flag's value.
 */
export function createClientConfig(
  ctx: ClientContext,
  config: ConfigTemplate<ClientConfig>,
): Effect.Effect<ClientContext, ConfigurationError, FileSystem.FileSystem> {
  return loadOrWriteConfig({
    file: path.join(configDirectory(ctx.homeDir), CLIENT_CONFIG_FILE),
    template: config,
    schema: clientConfigSchema,
    keyStyle: "kebab",
  }).pipe(Effect.map(({ value }) => applyClientConfig(ctx, value)));
}

export function applyClientConfig(ctx: ClientContext, config: ClientConfig): ClientContext {
  const overridden = (flag: ClientContext["flagOverrides"][number]) => ctx.flagOverrides.includes(flag);
  return {
    ...ctx,
    chainId: overridden("chain-id") ? ctx.chainId : config.chainId,
    keyringBackend: overridden("keyring-backend") ? ctx.keyringBackend : config.keyringBackend,
    outputFormat: overridden("output") ? ctx.outputFormat : config.output,
    nodeUri: overridden("node") ? ctx.nodeUri : config.node,
    broadcastMode: config.broadcastMode,
  };
}
