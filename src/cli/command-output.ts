import type { Command } from "commander";
import type { OutputSink } from "../core/interfaces/output-sink";

/**
 * Output and error sinks of a command tree.
 *
 * Sinks are bound per command; a command without its own sinks writes to
 * those of its nearest ancestor, or to the process streams.
 */

export interface CommandOutput {
  readonly out: OutputSink;
  readonly err: OutputSink;
}

const outputs = new WeakMap<Command, CommandOutput>();

export function setCommandOutput(command: Command, output: CommandOutput): void {
  outputs.set(command, output);
  command.configureOutput({
    writeOut: (str) => {
      output.out.write(str);
    },
    writeErr: (str) => {
      output.err.write(str);
    },
  });
}

export function resolveCommandOutput(command: Command): CommandOutput {
  for (let current: Command | null = command; current; current = current.parent) {
    const output = outputs.get(current);
    if (output) {
      return output;
    }
  }
  return { out: process.stdout, err: process.stderr };
}

export function outOrStdout(command: Command): OutputSink {
  return resolveCommandOutput(command).out;
}

export function errOrStderr(command: Command): OutputSink {
  return resolveCommandOutput(command).err;
}
