import type { Command } from "commander";
import { Option } from "effect";
import type { LoggerService } from "../core/interfaces/logger";
import type { SettingsStore } from "../core/interfaces/settings";
import type { AppConfig, ConsensusConfig } from "../core/types/config";

/**
 * Server-side state produced by config interception
 */
export interface ServerContext {
  readonly logger: LoggerService;
  readonly settings: SettingsStore;
  readonly appConfig: AppConfig;
  readonly consensusConfig: ConsensusConfig;
  readonly homeDir: string;
  readonly configDir: string;
}

const serverContexts = new WeakMap<Command, ServerContext>();

export function setServerContext(command: Command, ctx: ServerContext): void {
  serverContexts.set(command, ctx);
}

/**
 * The server context of a command or its nearest ancestor
 */
export function getServerContext(command: Command): Option.Option<ServerContext> {
  for (let current: Command | null = command; current; current = current.parent) {
    const ctx = serverContexts.get(current);
    if (ctx) {
      return Option.some(ctx);
    }
  }
  return Option.none();
}
