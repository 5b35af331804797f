import type { Command } from "commander";
import { Context, type Option } from "effect";

/**
 * Capabilities the node builder needs from a node implementation.
 */
export interface NodeI {
  /** Attach the assembled root command. */
  readonly setRootCommand: (command: Command) => void;
  readonly rootCommand: () => Option.Option<Command>;
}

export type NodeFactory<NodeT extends NodeI> = () => NodeT;

/**
 * Identity of the node binary, supplied to providers by the builder.
 */
export interface NodeInfo {
  readonly name: string;
  readonly description: string;
  /** Home directory used when --home is not given */
  readonly defaultHome: string;
}

export const NodeInfoTag = Context.GenericTag<NodeInfo>("NodeInfo");
