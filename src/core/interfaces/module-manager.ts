import type { Command } from "commander";
import { Context, Effect } from "effect";
import type { GenesisError } from "../types/errors";
import type { ChainSpec } from "./chain-spec";

/**
 * Commands a module contributes to the CLI. Factories are called once per
 * enhanced root command so every tree gets fresh command instances.
 */
export interface ModuleCommands {
  readonly query?: () => Command;
  readonly tx?: () => Command;
  readonly root?: readonly (() => Command)[];
}

export interface AppModule {
  readonly name: string;
  readonly defaultGenesis: (chainSpec: ChainSpec) => unknown;
  readonly validateGenesis: (
    state: unknown,
    chainSpec: ChainSpec,
  ) => Effect.Effect<void, GenesisError>;
  readonly commands?: ModuleCommands;
}

export interface ModuleManager {
  /** Module names in registration order. */
  readonly moduleNames: () => readonly string[];
  readonly modules: () => readonly AppModule[];
  /** Genesis document keyed by module name. */
  readonly defaultGenesis: (chainSpec: ChainSpec) => Record<string, unknown>;
  /** Fails on the first missing, unknown or invalid module section. */
  readonly validateGenesis: (
    genesis: Readonly<Record<string, unknown>>,
    chainSpec: ChainSpec,
  ) => Effect.Effect<void, GenesisError>;
}

export const ModuleManagerTag = Context.GenericTag<ModuleManager>("ModuleManager");
