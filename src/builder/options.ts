import type { RootCommandSetup } from "../cli/root-setup";
import { configs, type DependencyConfig, type Resolver } from "../core/di/container";
import type { AppCreator } from "../core/interfaces/application";
import type { NodeI } from "../core/interfaces/node";
import type { OutputSink } from "../core/interfaces/output-sink";
import type { SettingsStore } from "../core/interfaces/settings";
import type { NodeBuilder } from "./builder";

/**
 * Functional options for {@link NodeBuilder}. Options run in the order given;
 * a later option overrides an earlier one, except {@link withComponents},
 * which appends.
 */
export type NodeOption<NodeT extends NodeI> = (builder: NodeBuilder<NodeT>) => void;

export function withName<NodeT extends NodeI>(name: string): NodeOption<NodeT> {
  return (builder) => {
    builder.name = name;
  };
}

export function withDescription<NodeT extends NodeI>(description: string): NodeOption<NodeT> {
  return (builder) => {
    builder.description = description;
  };
}

/**
 * Extra registrations merged after the builder's own providers
 */
export function withComponents<NodeT extends NodeI>(
  ...components: readonly DependencyConfig[]
): NodeOption<NodeT> {
  return (builder) => {
    builder.components = [...builder.components, ...components];
  };
}

/**
 * Base dependency configuration of the node, typically its modules and autocli
 */
export function withDependencyConfig<NodeT extends NodeI>(
  ...parts: readonly DependencyConfig[]
): NodeOption<NodeT> {
  return (builder) => {
    builder.dependencyConfig = configs(...parts);
  };
}

export function withResolver<NodeT extends NodeI>(resolver: Resolver): NodeOption<NodeT> {
  return (builder) => {
    builder.resolver = resolver;
  };
}

export function withRootCommandSetup<NodeT extends NodeI>(setup: RootCommandSetup): NodeOption<NodeT> {
  return (builder) => {
    builder.rootCommandSetup = setup;
  };
}

export function withSettings<NodeT extends NodeI>(settings: SettingsStore): NodeOption<NodeT> {
  return (builder) => {
    builder.settings = settings;
  };
}

export function withAppCreator<NodeT extends NodeI>(appCreator: AppCreator): NodeOption<NodeT> {
  return (builder) => {
    builder.appCreator = appCreator;
  };
}

/**
 * Sink for the builder's own log lines; stderr by default
 */
export function withLoggerOutput<NodeT extends NodeI>(output: OutputSink): NodeOption<NodeT> {
  return (builder) => {
    builder.loggerOutput = output;
  };
}
