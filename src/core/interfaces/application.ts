import { Effect } from "effect";
import type { NodeError } from "../types/errors";
import type { ChainSpec } from "./chain-spec";
import type { LoggerService } from "./logger";
import type { ModuleManager } from "./module-manager";
import type { SettingsStore } from "./settings";

/**
 * A running node process. `start` runs until interrupted.
 */
export interface Application {
  readonly name: string;
  readonly start: () => Effect.Effect<void, NodeError>;
  readonly close: () => Effect.Effect<void, never>;
}

export interface AppCreatorOptions {
  readonly logger: LoggerService;
  readonly settings: SettingsStore;
  readonly homeDir: string;
  readonly moduleManager: ModuleManager;
  readonly chainSpec: ChainSpec;
}

export type AppCreator = (options: AppCreatorOptions) => Effect.Effect<Application, NodeError>;
