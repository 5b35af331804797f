import { Command } from "commander";
import { Effect, Option } from "effect";
import { defaultAppCreator } from "../app/application";
import { runCommandEffect } from "../cli/run-command";
import { defaultRootCommandSetup, type RootCommandSetup } from "../cli/root-setup";
import { addPersistentFlags } from "../client/flags";
import { initClientConfig } from "../components/client-config";
import { appConfigTemplate } from "../components/app-config";
import { consensusConfigTemplate } from "../components/consensus-config";
import { defaultProviders } from "../components/providers";
import {
  configs,
  DefaultResolver,
  emptyConfig,
  supply,
  type DependencyConfig,
  type Resolver,
} from "../core/di/container";
import type { AppCreator } from "../core/interfaces/application";
import { AutoCliOptionsTag } from "../core/interfaces/autocli";
import { ChainSpecTag } from "../core/interfaces/chain-spec";
import { ClientContextTag } from "../core/interfaces/client-context";
import { LoggerServiceTag, type LoggerService, type LogLevel } from "../core/interfaces/logger";
import { ModuleManagerTag } from "../core/interfaces/module-manager";
import { NodeInfoTag, type NodeFactory, type NodeI } from "../core/interfaces/node";
import type { OutputSink } from "../core/interfaces/output-sink";
import { SettingsStoreTag, type SettingsStore } from "../core/interfaces/settings";
import type { EnhancementError, ResolutionError } from "../core/types/errors";
import { defaultNodeHome } from "../core/utils/paths";
import { createStreamLogger, parseLogLevel } from "../services/logger";
import { getGlobalSettings } from "../services/settings";
import type { NodeOption } from "./options";
import { envPrefixFor, preRun } from "./root-command";

/**
 * Assembles a node and its command line.
 *
 * Options are applied by {@link newNodeBuilder}; {@link NodeBuilder.build}
 * resolves the dependency configuration, builds the root command and attaches
 * it to the node. The node is only touched once everything succeeded.
 */
export class NodeBuilder<NodeT extends NodeI> {
  name = "";
  description = "";
  dependencyConfig: DependencyConfig = emptyConfig;
  components: readonly DependencyConfig[] = [];
  resolver: Resolver = DefaultResolver;
  rootCommandSetup: RootCommandSetup = defaultRootCommandSetup;
  settings: SettingsStore = getGlobalSettings();
  appCreator: AppCreator = defaultAppCreator;
  loggerOutput: OutputSink = process.stderr;

  private built = false;

  constructor(private readonly node: NodeT) {}

  /**
   * Resolve dependencies, build the root command and attach it to the node.
   * Calling it again after a successful build returns the same node.
   */
  build(): Effect.Effect<NodeT, ResolutionError | EnhancementError> {
    return Effect.suspend<NodeT, ResolutionError | EnhancementError, never>(() => {
      if (this.built) {
        return Effect.succeed(this.node);
      }
      return this.buildRootCommand().pipe(
        Effect.map((root) => {
          this.node.setRootCommand(root);
          this.built = true;
          return this.node;
        }),
      );
    });
  }

  /**
   * Resolve the autocli options, module manager, client context and chain
   * spec, then assemble the root command from them.
   */
  buildRootCommand(): Effect.Effect<Command, ResolutionError | EnhancementError> {
    const self = this;
    return Effect.gen(function* () {
      const envPrefix = envPrefixFor(self.name);
      self.settings.setEnvPrefix(envPrefix);
      const rawLevel = self.settings.getString("logger.log-level", "info");
      const level = parseLogLevel(rawLevel);
      const logger = self.makeLogger(Option.getOrElse(level, () => "info" as const));
      if (Option.isNone(level)) {
        yield* logger.warn("ignoring invalid log level", { level: rawLevel, fallback: "info" });
      }

      yield* logger.debug("resolving dependencies", { node: self.name, state: "resolving" });
      const resolved = yield* self.resolver
        .inject(self.fullDependencyConfig(logger), (lookup) =>
          Effect.all({
            autoCliOptions: lookup(AutoCliOptionsTag),
            moduleManager: lookup(ModuleManagerTag),
            clientContext: lookup(ClientContextTag),
            chainSpec: lookup(ChainSpecTag),
          }),
        )
        .pipe(
          Effect.tapError((error) =>
            logger.debug("dependency resolution failed", {
              state: "resolution-failed",
              dependency: error.dependency,
              reason: error.reason,
            }),
          ),
        );
      yield* logger.debug("dependencies resolved", {
        state: "resolved",
        chainSpec: resolved.chainSpec.name,
        modules: resolved.moduleManager.moduleNames().join(","),
      });

      yield* logger.debug("assembling root command", { state: "assembling" });
      const root = new Command(self.name).description(self.description);
      addPersistentFlags(root, resolved.clientContext.homeDir);
      root.hook("preAction", async (_thisCommand, actionCommand) => {
        await runCommandEffect(
          preRun(actionCommand, {
            baseContext: resolved.clientContext,
            clientConfig: initClientConfig,
            appConfig: appConfigTemplate,
            consensusConfig: consensusConfigTemplate,
            settings: self.settings,
            envPrefix,
          }),
        );
      });

      yield* self
        .rootCommandSetup(root, resolved.moduleManager, self.appCreator, resolved.chainSpec)
        .pipe(
          Effect.zipRight(resolved.autoCliOptions.enhanceRootCommand(root)),
          Effect.tapError((error) =>
            logger.debug("root command enhancement failed", {
              state: "enhancement-failed",
              command: error.command,
            }),
          ),
        );
      yield* logger.debug("root command assembled", {
        state: "assembled",
        commands: root.commands.map((command) => command.name()).join(","),
      });
      return root;
    });
  }

  private fullDependencyConfig(logger: LoggerService): DependencyConfig {
    return configs(
      this.dependencyConfig,
      supply(LoggerServiceTag, logger),
      supply(SettingsStoreTag, this.settings),
      supply(NodeInfoTag, {
        name: this.name,
        description: this.description,
        defaultHome: defaultNodeHome(this.name),
      }),
      defaultProviders(),
      ...this.components,
    );
  }

  private makeLogger(level: LogLevel): LoggerService {
    return createStreamLogger(this.loggerOutput, { level }).withModule("builder");
  }
}

/**
 * Create a builder around a fresh node and apply `options` in order.
 */
export function newNodeBuilder<NodeT extends NodeI>(
  factory: NodeFactory<NodeT>,
  ...options: readonly NodeOption<NodeT>[]
): NodeBuilder<NodeT> {
  const builder = new NodeBuilder(factory());
  for (const option of options) {
    option(builder);
  }
  return builder;
}
