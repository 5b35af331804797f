import { Command, Option as CommandOption } from "commander";
import type { ClientFlag } from "../core/interfaces/client-context";

/**
 * Persistent flags shared by every command of the node CLI
 */

export interface FlagDefinition {
  readonly flags: string;
  readonly description: string;
  /** Commander attribute name of the option */
  readonly attribute: string;
}

export const CLIENT_FLAGS: Readonly<Record<ClientFlag, FlagDefinition>> = {
  home: {
    flags: "--home <dir>",
    description: "directory for config and data",
    attribute: "home",
  },
  "chain-id": {
    flags: "--chain-id <id>",
    description: "the network chain ID",
    attribute: "chainId",
  },
  "keyring-backend": {
    flags: "--keyring-backend <backend>",
    description: "select keyring's backend (memory|test)",
    attribute: "keyringBackend",
  },
  "keyring-dir": {
    flags: "--keyring-dir <dir>",
    description: "the client keyring directory; if omitted, the home directory will be used",
    attribute: "keyringDir",
  },
  node: {
    flags: "--node <uri>",
    description: "<host>:<port> to the consensus RPC interface for this chain",
    attribute: "node",
  },
  output: {
    flags: "-o, --output <format>",
    description: "output format (text|json)",
    attribute: "output",
  },
  from: {
    flags: "--from <name>",
    description: "name of the key to sign with",
    attribute: "from",
  },
  offline: {
    flags: "--offline",
    description: "offline mode (does not allow any online functionality)",
    attribute: "offline",
  },
};

export const LOG_LEVEL_FLAG: FlagDefinition = {
  flags: "--log-level <level>",
  description: "the logging level (debug|info|warn|error)",
  attribute: "logLevel",
};

export const LOG_FORMAT_FLAG: FlagDefinition = {
  flags: "--log-format <format>",
  description: "the logging format (pretty|json)",
  attribute: "logFormat",
};

/**
 * Register the persistent client and logging flags on a root command.
 */
export function addPersistentFlags(command: Command, homeDir: string): Command {
  for (const [name, definition] of Object.entries(CLIENT_FLAGS)) {
    const option = new CommandOption(definition.flags, definition.description);
    if (name === "home") {
      option.default(homeDir);
    }
    command.addOption(option);
  }
  command.addOption(new CommandOption(LOG_LEVEL_FLAG.flags, LOG_LEVEL_FLAG.description));
  command.addOption(new CommandOption(LOG_FORMAT_FLAG.flags, LOG_FORMAT_FLAG.description));
  return command;
}

export interface FlagValue {
  readonly value: unknown;
  /** Set on the command line or from the environment rather than defaulted */
  readonly changed: boolean;
}

/**
 * Find a flag on the command or its nearest ancestor declaring it.
 */
export function lookupFlag(command: Command, attribute: string): FlagValue | undefined {
  for (let current: Command | null = command; current; current = current.parent) {
    if (current.options.some((option) => option.attributeName() === attribute)) {
      const source = current.getOptionValueSource(attribute);
      const value: unknown = current.getOptionValue(attribute);
      return { value, changed: source === "cli" || source === "env" };
    }
  }
  return undefined;
}
