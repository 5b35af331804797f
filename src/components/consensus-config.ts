import os from "node:os";
import type { ConfigTemplate, ConsensusConfig } from "../core/types/config";

/**
 * Defaults and template for the consensus engine's config.toml
 */

export function defaultConsensusConfig(moniker: string = defaultMoniker()): ConsensusConfig {
  return {
    moniker,
    dbBackend: "pebbledb",
    dbDir: "data",
    logLevel: "info",
    p2p: {
      laddr: "tcp://0.0.0.0:26656",
      persistentPeers: "",
      maxNumInboundPeers: 40,
      maxNumOutboundPeers: 10,
    },
    rpc: {
      laddr: "tcp://127.0.0.1:26657",
    },
    consensus: {
      timeoutPropose: "3s",
      timeoutCommit: "1s",
    },
  };
}

function defaultMoniker(): string {
  const hostname = os.hostname().trim();
  return hostname.length > 0 ? hostname : "node";
}

export function defaultConsensusConfigTemplate(): string {
  return `# This is a TOML config file.
# For more information, see https://github.com/toml-lang/toml

# A custom human readable name for this node
moniker = {{ .moniker }}

# Database backend: goleveldb | pebbledb | memdb
db_backend = {{ .dbBackend }}

# Database directory, relative to the node home
db_dir = {{ .dbDir }}

# Output level for logging: debug | info | warn | error
log_level = {{ .logLevel }}

#######################################################
###           P2P Configuration Options             ###
#######################################################
[p2p]

# Address to listen for incoming connections
laddr = {{ .p2p.laddr }}

# Comma separated list of nodes to keep persistent connections to
persistent_peers = {{ .p2p.persistentPeers }}

# Maximum number of inbound and outbound peers
max_num_inbound_peers = {{ .p2p.maxNumInboundPeers }}
max_num_outbound_peers = {{ .p2p.maxNumOutboundPeers }}

#######################################################
###           RPC Server Configuration Options      ###
#######################################################
[rpc]

# TCP or UNIX socket address for the RPC server to listen on
laddr = {{ .rpc.laddr }}

#######################################################
###         Consensus Configuration Options         ###
#######################################################
[consensus]

# How long we wait for a proposal block before prevoting nil
timeout_propose = {{ .consensus.timeoutPropose }}

# How long we wait after committing a block before starting on the new height
timeout_commit = {{ .consensus.timeoutCommit }}
`;
}

export function consensusConfigTemplate(): ConfigTemplate<ConsensusConfig> {
  return { template: defaultConsensusConfigTemplate(), defaults: defaultConsensusConfig() };
}
