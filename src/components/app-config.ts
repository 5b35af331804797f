import type { AppConfig, ConfigTemplate } from "../core/types/config";

/**
 * Defaults and template for app.toml
 */

export function defaultAppConfig(): AppConfig {
  return {
    pruning: "default",
    pruningKeepRecent: 0,
    pruningInterval: 0,
    haltHeight: 0,
    minRetainBlocks: 0,
    telemetry: {
      enabled: false,
      serviceName: "",
    },
    engine: {
      rpcDialUrl: "http://localhost:8551",
      rpcTimeoutMs: 2000,
      jwtSecretPath: "./jwt.hex",
    },
    payloadBuilder: {
      enabled: true,
      suggestedFeeRecipient: "0x0000000000000000000000000000000000000000",
    },
    logger: {
      timeFormat: "RFC3339",
      logLevel: "info",
      style: "pretty",
    },
  };
}

export function defaultAppConfigTemplate(): string {
  return `# This is a TOML config file.
# For more information, see https://github.com/toml-lang/toml

###############################################################################
###                           Base Configuration                            ###
###############################################################################

# default: the last 362880 states are kept, pruning at 10 block intervals
# nothing: all historic states will be saved, nothing will be deleted
# everything: 2 latest states will be kept; pruning at 10 block intervals
# custom: allow pruning options to be manually specified through 'pruning-keep-recent' and 'pruning-interval'
pruning = {{ .pruning }}

# These are applied if and only if the pruning strategy is custom.
pruning-keep-recent = {{ .pruningKeepRecent }}
pruning-interval = {{ .pruningInterval }}

# Block height at which the node gracefully halts; 0 disables halting.
halt-height = {{ .haltHeight }}

# Minimum block height offset during ABCI commit to prune blocks; 0 keeps all blocks.
min-retain-blocks = {{ .minRetainBlocks }}

###############################################################################
###                         Telemetry Configuration                         ###
###############################################################################

[telemetry]
enabled = {{ .telemetry.enabled }}
service-name = {{ .telemetry.serviceName }}

###############################################################################
###                          Execution Engine                               ###
###############################################################################

[engine]
# HTTP url of the execution client JSON-RPC endpoint.
rpc-dial-url = {{ .engine.rpcDialUrl }}

# Timeout for engine RPC calls, in milliseconds.
rpc-timeout-ms = {{ .engine.rpcTimeoutMs }}

# Path to the execution client JWT secret.
jwt-secret-path = {{ .engine.jwtSecretPath }}

[payload-builder]
# Build payloads locally instead of waiting for a remote builder.
enabled = {{ .payloadBuilder.enabled }}

# Fee recipient address used when building payloads.
suggested-fee-recipient = {{ .payloadBuilder.suggestedFeeRecipient }}

[logger]
time-format = {{ .logger.timeFormat }}
log-level = {{ .logger.logLevel }}

# "pretty" or "json"
style = {{ .logger.style }}
`;
}

export function appConfigTemplate(): ConfigTemplate<AppConfig> {
  return { template: defaultAppConfigTemplate(), defaults: defaultAppConfig() };
}
