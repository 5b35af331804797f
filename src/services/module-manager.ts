import { Effect } from "effect";
import type { ChainSpec } from "../core/interfaces/chain-spec";
import type { AppModule, ModuleManager } from "../core/interfaces/module-manager";
import { GenesisError, InternalError } from "../core/types/errors";

/**
 * Ordered registry of application modules
 */
export class ModuleManagerImpl implements ModuleManager {
  private readonly registered: readonly AppModule[];

  constructor(modules: readonly AppModule[]) {
    this.registered = [...modules];
  }

  moduleNames(): readonly string[] {
    return this.registered.map((module) => module.name);
  }

  modules(): readonly AppModule[] {
    return this.registered;
  }

  defaultGenesis(chainSpec: ChainSpec): Record<string, unknown> {
    const genesis: Record<string, unknown> = {};
    for (const module of this.registered) {
      genesis[module.name] = module.defaultGenesis(chainSpec);
    }
    return genesis;
  }

  validateGenesis(
    genesis: Readonly<Record<string, unknown>>,
    chainSpec: ChainSpec,
  ): Effect.Effect<void, GenesisError> {
    const names = new Set(this.moduleNames());
    const unknown = Object.keys(genesis).find((key) => !names.has(key));
    if (unknown !== undefined) {
      return Effect.fail(
        new GenesisError({
          module: unknown,
          message: `genesis contains a section for unregistered module "${unknown}"`,
        }),
      );
    }

    return Effect.forEach(
      this.registered,
      (module) => {
        if (!(module.name in genesis)) {
          return Effect.fail(
            new GenesisError({
              module: module.name,
              message: `genesis is missing the "${module.name}" section`,
            }),
          );
        }
        return module.validateGenesis(genesis[module.name], chainSpec);
      },
      { discard: true },
    );
  }
}

/**
 * Create a module manager, rejecting duplicate module names
 */
export function createModuleManager(
  modules: readonly AppModule[],
): Effect.Effect<ModuleManager, InternalError> {
  const seen = new Set<string>();
  for (const module of modules) {
    if (seen.has(module.name)) {
      return Effect.fail(
        new InternalError({
          component: "module-manager",
          message: `module "${module.name}" is registered twice`,
        }),
      );
    }
    seen.add(module.name);
  }
  return Effect.succeed(new ModuleManagerImpl(modules));
}
