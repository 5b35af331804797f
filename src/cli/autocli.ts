import { Command } from "commander";
import { Effect } from "effect";
import type { Lookup } from "../core/di/container";
import type { AutoCliOptions } from "../core/interfaces/autocli";
import { ModuleManagerTag, type ModuleCommands } from "../core/interfaces/module-manager";
import { EnhancementError, type ResolutionError } from "../core/types/errors";

/**
 * Binding of module-declared commands onto a root command
 */

const GROUPS = {
  query: { name: "query", alias: "q", description: "Querying subcommands" },
  tx: { name: "tx", alias: "t", description: "Transactions subcommands" },
} as const;

type GroupName = keyof typeof GROUPS;

function isGroupName(value: string): value is GroupName {
  return value in GROUPS;
}

interface Placement {
  readonly module: string;
  readonly group: GroupName | undefined;
  readonly command: Command;
}

function commandNames(command: Command): readonly string[] {
  return [command.name(), ...command.aliases()];
}

function findChild(parent: Command, name: string): Command | undefined {
  return parent.commands.find((child) => commandNames(child).includes(name));
}

function placementsFor(module: string, commands: ModuleCommands): Placement[] {
  const placements: Placement[] = [];
  if (commands.query) {
    placements.push({ module, group: "query", command: commands.query() });
  }
  if (commands.tx) {
    placements.push({ module, group: "tx", command: commands.tx() });
  }
  for (const factory of commands.root ?? []) {
    placements.push({ module, group: undefined, command: factory() });
  }
  return placements;
}

/**
 * Attach every module command to `root`: query and tx commands under their
 * group (created when missing), the rest at the top level. Nothing is
 * attached when any name collides with an existing or another module's
 * command.
 */
export function enhanceRootCommand(
  root: Command,
  modules: ReadonlyMap<string, ModuleCommands>,
): Effect.Effect<void, EnhancementError> {
  return Effect.suspend<void, EnhancementError, never>(() => {
    const placements = [...modules].flatMap(([module, commands]) => placementsFor(module, commands));

    const taken = new Map<string, string>();
    for (const group of Object.keys(GROUPS).filter(isGroupName)) {
      const { name, alias } = GROUPS[group];
      if (placements.some((placement) => placement.group === group) && !findChild(root, name)) {
        taken.set(`${root.name()} ${name}`, `the ${name} command group`);
        taken.set(`${root.name()} ${alias}`, `the ${name} command group`);
      }
    }

    for (const placement of placements) {
      const scope = placement.group ? `${root.name()} ${placement.group}` : root.name();
      const parent = placement.group ? findChild(root, GROUPS[placement.group].name) : root;
      for (const name of commandNames(placement.command)) {
        const key = `${scope} ${name}`;
        const owner =
          taken.get(key) ?? (parent && findChild(parent, name) ? "root command setup" : undefined);
        if (owner !== undefined) {
          return Effect.fail(
            new EnhancementError({
              command: key,
              message: `module "${placement.module}" cannot register "${key}": already registered by ${owner}`,
              suggestion: "Rename one of the commands or drop it from the module",
            }),
          );
        }
        taken.set(key, `module "${placement.module}"`);
      }
    }

    for (const placement of placements) {
      const parent = placement.group ? ensureGroup(root, placement.group) : root;
      parent.addCommand(placement.command);
    }
    return Effect.void;
  });
}

function ensureGroup(root: Command, group: GroupName): Command {
  const { name, alias, description } = GROUPS[group];
  const existing = findChild(root, name);
  if (existing) {
    return existing;
  }
  const created = new Command(name).alias(alias).description(description);
  root.addCommand(created);
  return created;
}

/**
 * Autocli options from the commands declared by the module manager's modules
 */
export function provideAutoCliOptions(lookup: Lookup): Effect.Effect<AutoCliOptions, ResolutionError> {
  return Effect.gen(function* () {
    const moduleManager = yield* lookup(ModuleManagerTag);
    const modules = new Map<string, ModuleCommands>();
    for (const module of moduleManager.modules()) {
      if (module.commands) {
        modules.set(module.name, module.commands);
      }
    }
    return {
      modules,
      enhanceRootCommand: (root) => enhanceRootCommand(root, modules),
    };
  });
}
