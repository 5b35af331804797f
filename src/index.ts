export { NodeBuilder, newNodeBuilder } from "./builder/builder";
export {
  withAppCreator,
  withComponents,
  withDependencyConfig,
  withDescription,
  withLoggerOutput,
  withName,
  withResolver,
  withRootCommandSetup,
  withSettings,
  type NodeOption,
} from "./builder/options";
export { preRun, type PreRunOptions } from "./builder/root-command";
export { Node, newNode } from "./node/node";
export {
  configs,
  DefaultResolver,
  emptyConfig,
  inject,
  lookupFromContext,
  provide,
  registeredKeys,
  supply,
  type DependencyConfig,
  type Lookup,
  type Resolver,
  type Selector,
} from "./core/di/container";
export { enhanceRootCommand, provideAutoCliOptions } from "./cli/autocli";
export { defaultRootCommandSetup, type RootCommandSetup } from "./cli/root-setup";
export { errOrStderr, outOrStdout, setCommandOutput } from "./cli/command-output";
export {
  getClientContext,
  makeClientContext,
  readPersistentCommandFlags,
  setCommandClientContext,
} from "./client/context";
export { createClientConfig } from "./config/client-config";
export { interceptConfigs, type InterceptOptions } from "./config/intercept";
export { getServerContext, type ServerContext } from "./server/context";
export {
  defaultProviders,
  provideAppConfig,
  provideChainSpec,
  provideClientContext,
  provideKeyring,
  provideNoopTxConfig,
} from "./components/providers";
export { appConfigTemplate, defaultAppConfig, defaultAppConfigTemplate } from "./components/app-config";
export {
  consensusConfigTemplate,
  defaultConsensusConfig,
  defaultConsensusConfigTemplate,
} from "./components/consensus-config";
export { defaultClientConfig, initClientConfig } from "./components/client-config";
export { CHAIN_SPECS, chainSpecByName } from "./components/chain-spec";
export { createStreamLogger } from "./services/logger";
export { getGlobalSettings } from "./services/settings";
export { createModuleManager } from "./services/module-manager";
export { defaultAppCreator } from "./app/application";
export { formatError, handleError } from "./core/utils/error-handler";
export * from "./core/types/errors";
export * from "./core/interfaces/app-config";
export * from "./core/interfaces/application";
export * from "./core/interfaces/autocli";
export * from "./core/interfaces/chain-spec";
export * from "./core/interfaces/client-context";
export * from "./core/interfaces/keyring";
export * from "./core/interfaces/logger";
export * from "./core/interfaces/module-manager";
export * from "./core/interfaces/node";
export * from "./core/interfaces/output-sink";
export * from "./core/interfaces/settings";
export * from "./core/interfaces/tx-config";
