import { Effect } from "effect";
import type { OutputSink } from "../interfaces/output-sink";
import { isNodeError, type NodeError } from "../types/errors";

/**
 * Error display with actionable suggestions
 */

export interface ErrorDisplay {
  readonly title: string;
  readonly message: string;
  readonly suggestion?: string;
  readonly recovery?: string[];
  readonly relatedCommands?: string[];
}

/**
 * Generate actionable suggestions for different error types
 *
 * @param binary - Name of the node binary used in suggested commands
 * @internal
 */
function generateSuggestions(error: NodeError, binary: string): ErrorDisplay {
  switch (error._tag) {
    case "ResolutionError": {
      const recovery: Record<typeof error.reason, string[]> = {
        missing: [
          `Register a provider for ${error.dependency} in the node's dependency configuration`,
          "Check that every component passed with withComponents is included",
        ],
        duplicate: [
          `Remove one of the registrations of ${error.dependency}`,
          "Components must not re-register the builder's default providers",
        ],
        cycle: ["Break the cycle by removing one of the lookups along the path"],
        "provider-failed": [`Fix the provider of ${error.dependency}: ${error.path.join(" -> ")}`],
      };
      return {
        title: "Dependency Resolution Failed",
        message: error.message,
        suggestion: error.suggestion || `Check how ${error.dependency} is provided`,
        recovery: recovery[error.reason],
      };
    }

    case "EnhancementError": {
      return {
        title: "Command Registration Failed",
        message: error.message,
        suggestion: error.suggestion || `Resolve the conflict on "${error.command}"`,
        recovery: ["Rename one of the conflicting commands", "Remove the command from the module"],
        relatedCommands: [`${binary} --help`],
      };
    }

    case "ConfigurationError": {
      return {
        title: "Configuration Error",
        message: error.field ? `${error.file}: ${error.field}: ${error.message}` : `${error.file}: ${error.message}`,
        suggestion: error.suggestion || `Fix the configuration issue in ${error.file}`,
        recovery: [
          "Check the value against the comments in the file",
          "Delete the file to have it regenerated with defaults",
        ],
        relatedCommands: [`${binary} config show`],
      };
    }

    case "FlagParseError": {
      return {
        title: "Invalid Flag",
        message: error.message,
        suggestion: error.suggestion || `Check the value passed to --${error.flag}`,
        relatedCommands: [`${binary} --help`],
      };
    }

    case "KeyringError": {
      return {
        title: "Keyring Error",
        message: error.message,
        suggestion: error.suggestion || `The ${error.operation} operation on the ${error.backend} keyring failed`,
        relatedCommands: [`${binary} keys list`, `${binary} keys add <name>`],
      };
    }

    case "GenesisError": {
      return {
        title: "Invalid Genesis",
        message: error.path ? `${error.module}: ${error.path}: ${error.message}` : `${error.module}: ${error.message}`,
        suggestion: error.suggestion || "Fix the genesis file or recreate it",
        recovery: [`Recreate it: \`${binary} init <moniker> --overwrite\``],
        relatedCommands: [`${binary} genesis validate`],
      };
    }

    case "FileSystemError": {
      return {
        title: "File System Error",
        message: `Failed to ${error.operation} ${error.path}: ${error.reason}`,
        suggestion: error.suggestion || "Check file path and permissions",
      };
    }

    case "InternalError": {
      return {
        title: "Internal Error",
        message: `${error.component}: ${error.message}`,
        suggestion: error.suggestion || "This is an internal error. Please report it.",
      };
    }
  }
}

/**
 * Format an error for display: title, message, suggestion, recovery steps and
 * related commands.
 */
export function formatError(error: NodeError, binary: string): string {
  const display = generateSuggestions(error, binary);

  let output = `❌ ${display.title}\n`;
  output += `   ${display.message}\n`;

  if (display.suggestion) {
    output += `\n💡 Suggestion: ${display.suggestion}\n`;
  }

  if (display.recovery && display.recovery.length > 0) {
    output += `\n🔧 Recovery Steps:\n`;
    display.recovery.forEach((step, index) => {
      output += `   ${index + 1}. ${step}\n`;
    });
  }

  if (display.relatedCommands && display.relatedCommands.length > 0) {
    output += `\n📚 Related Commands:\n`;
    display.relatedCommands.forEach((cmd) => {
      output += `   • ${cmd}\n`;
    });
  }

  return output;
}

/**
 * Write a failure to `sink`. Node errors get the full display; anything else
 * its message.
 */
export function handleError(error: unknown, sink: OutputSink, binary: string): Effect.Effect<void> {
  return Effect.sync(() => {
    if (isNodeError(error)) {
      sink.write(formatError(error, binary));
      return;
    }
    const message = error instanceof Error ? error.message : String(error);
    sink.write(`❌ Error\n   ${message}\n\n📚 Related Commands:\n   • ${binary} --help\n`);
  });
}
