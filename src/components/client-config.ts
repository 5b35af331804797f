import type { ClientConfig, ConfigTemplate } from "../core/types/config";

/**
 * Template and defaults for client.toml
 */

export const defaultClientConfigTemplate = `# This is a TOML config file.
# For more information, see https://github.com/toml-lang/toml

###############################################################################
###                           Client Configuration                          ###
###############################################################################

# The network chain ID
chain-id = {{ .chainId }}
# The keyring's backend, where the keys are stored (memory|test)
keyring-backend = {{ .keyringBackend }}
# CLI output format (text|json)
output = {{ .output }}
# <host>:<port> to the consensus RPC interface for this chain
node = {{ .node }}
# Transaction broadcasting mode (sync|async)
broadcast-mode = {{ .broadcastMode }}
`;

export function defaultClientConfig(): ClientConfig {
  return {
    chainId: "",
    keyringBackend: "test",
    output: "text",
    node: "tcp://localhost:26657",
    broadcastMode: "sync",
  };
}

/**
 * Client config template and values the pre-run hook merges into the client
 * context.
 */
export function initClientConfig(): ConfigTemplate<ClientConfig> {
  return { template: defaultClientConfigTemplate, defaults: defaultClientConfig() };
}
