import type { Command } from "commander";
import { Option } from "effect";
import type { NodeI } from "../core/interfaces/node";
import { InternalError } from "../core/types/errors";

/**
 * A node process driven by its root command
 */
export class Node implements NodeI {
  private root: Option.Option<Command> = Option.none();

  setRootCommand(command: Command): void {
    this.root = Option.some(command);
  }

  rootCommand(): Option.Option<Command> {
    return this.root;
  }

  /**
   * Parse `argv` (as in `process.argv`) and run the selected command.
   */
  async run(argv: readonly string[] = process.argv): Promise<void> {
    if (Option.isNone(this.root)) {
      throw new InternalError({
        component: "node",
        message: "node has no root command",
        suggestion: "Build the node with a NodeBuilder before running it",
      });
    }
    await this.root.value.parseAsync([...argv]);
  }
}

export function newNode(): Node {
  return new Node();
}
