import { provideAutoCliOptions } from "../cli/autocli";
import { configs, provide, type DependencyConfig } from "../core/di/container";
import { AutoCliOptionsTag } from "../core/interfaces/autocli";
import { ModuleManagerTag, type AppModule } from "../core/interfaces/module-manager";
import { createModuleManager } from "../services/module-manager";
import { beaconModule } from "./modules/beacon";
import { stakingModule } from "./modules/staking";

export const DEFAULT_MODULES: readonly AppModule[] = [beaconModule, stakingModule];

/**
 * Dependency configuration of the example node: its modules and the autocli
 * options binding their commands
 */
export function appDependencyConfig(modules: readonly AppModule[] = DEFAULT_MODULES): DependencyConfig {
  return configs(
    provide(ModuleManagerTag, () => createModuleManager(modules)),
    provide(AutoCliOptionsTag, provideAutoCliOptions),
  );
}
