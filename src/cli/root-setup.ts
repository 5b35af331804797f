import { Command } from "commander";
import { Effect } from "effect";
import type { AppCreator } from "../core/interfaces/application";
import type { ChainSpec } from "../core/interfaces/chain-spec";
import type { ModuleManager } from "../core/interfaces/module-manager";
import { EnhancementError } from "../core/types/errors";
import { commandEnv } from "./command-env";
import { configShowCommand } from "./commands/config";
import { genesisValidateCommand } from "./commands/genesis";
import { initCommand } from "./commands/init";
import {
  keysAddCommand,
  keysDeleteCommand,
  keysListCommand,
  keysShowCommand,
} from "./commands/keys";
import { startCommand } from "./commands/start";
import { versionCommand } from "./commands/version";
import { runCommandEffect } from "./run-command";

/**
 * Attaches the node's standard subcommands to a freshly built root command.
 */
export type RootCommandSetup = (
  root: Command,
  moduleManager: ModuleManager,
  appCreator: AppCreator,
  chainSpec: ChainSpec,
) => Effect.Effect<void, EnhancementError>;

const DEFAULT_COMMANDS = ["init", "start", "keys", "genesis", "version", "config"] as const;

/**
 * Default subcommands: init, start, keys, genesis, version and config
 */
export const defaultRootCommandSetup: RootCommandSetup = (root, moduleManager, appCreator, chainSpec) =>
  Effect.suspend<void, EnhancementError, never>(() => {
    const existing = DEFAULT_COMMANDS.find((name) =>
      root.commands.some((child) => child.name() === name || child.aliases().includes(name)),
    );
    if (existing !== undefined) {
      return Effect.fail(
        new EnhancementError({
          command: `${root.name()} ${existing}`,
          message: `"${existing}" is already registered on ${root.name()}`,
        }),
      );
    }

    root
      .command("init <moniker>")
      .description("Initialize the node's configuration files and genesis")
      .option("--overwrite", "overwrite an existing genesis file", false)
      .action(async (moniker: string, options: { overwrite: boolean }, command: Command) => {
        await runCommandEffect(
          Effect.flatMap(commandEnv(command), (env) =>
            initCommand(env, moduleManager, chainSpec, { moniker, overwrite: options.overwrite }),
          ),
        );
      });

    root
      .command("start")
      .description("Run the node")
      .action(async (_options: unknown, command: Command) => {
        await runCommandEffect(
          Effect.flatMap(commandEnv(command), (env) =>
            startCommand(env, moduleManager, appCreator, chainSpec),
          ),
        );
      });

    const keys = root.command("keys").description("Manage the keyring");
    keys
      .command("add <name>")
      .description("Generate a new key and store it under <name>")
      .action(async (name: string, _options: unknown, command: Command) => {
        await runCommandEffect(Effect.flatMap(commandEnv(command), (env) => keysAddCommand(env, name)));
      });
    keys
      .command("list")
      .alias("ls")
      .description("List all keys")
      .action(async (_options: unknown, command: Command) => {
        await runCommandEffect(Effect.flatMap(commandEnv(command), (env) => keysListCommand(env)));
      });
    keys
      .command("show <name>")
      .description("Show key details")
      .option("-a, --address", "output the address only", false)
      .action(async (name: string, options: { address: boolean }, command: Command) => {
        await runCommandEffect(
          Effect.flatMap(commandEnv(command), (env) => keysShowCommand(env, name, options.address)),
        );
      });
    keys
      .command("delete <name>")
      .description("Delete the key stored under <name>")
      .action(async (name: string, _options: unknown, command: Command) => {
        await runCommandEffect(
          Effect.flatMap(commandEnv(command), (env) => keysDeleteCommand(env, name)),
        );
      });

    root
      .command("genesis")
      .description("Genesis file utilities")
      .command("validate [file]")
      .description("Validate a genesis file, by default the node's own")
      .action(async (file: string | undefined, _options: unknown, command: Command) => {
        await runCommandEffect(
          Effect.flatMap(commandEnv(command), (env) =>
            genesisValidateCommand(env, moduleManager, chainSpec, file),
          ),
        );
      });

    root
      .command("version")
      .description("Print the node version")
      .action(async (_options: unknown, command: Command) => {
        await runCommandEffect(
          Effect.flatMap(commandEnv(command), (env) => versionCommand(env, root.name())),
        );
      });

    root
      .command("config")
      .description("Inspect the node configuration")
      .command("show")
      .description("Print the effective configuration")
      .action(async (_options: unknown, command: Command) => {
        await runCommandEffect(Effect.flatMap(commandEnv(command), (env) => configShowCommand(env)));
      });

    return Effect.void;
  });
