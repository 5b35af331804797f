import type { Command } from "commander";
import { Context, Effect } from "effect";
import type { EnhancementError } from "../types/errors";
import type { ModuleCommands } from "./module-manager";

/**
 * Everything needed to bind module-declared commands onto a root command.
 */
export interface AutoCliOptions {
  readonly modules: ReadonlyMap<string, ModuleCommands>;
  readonly enhanceRootCommand: (root: Command) => Effect.Effect<void, EnhancementError>;
}

export const AutoCliOptionsTag = Context.GenericTag<AutoCliOptions>("AutoCliOptions");
