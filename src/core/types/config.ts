/**
 * Configuration file types
 *
 * Files on disk use kebab-case (app.toml, client.toml) or snake_case
 * (config.toml) keys; these types describe the parsed, camel-cased shape.
 */

import type { BroadcastMode, OutputFormat } from "../interfaces/client-context";
import type { KeyringBackend } from "../interfaces/keyring";
import type { LogFormat, LogLevel } from "../interfaces/logger";

export type PruningStrategy = "default" | "nothing" | "everything" | "custom";

export interface TelemetryConfig {
  readonly enabled: boolean;
  readonly serviceName: string;
}

export interface EngineConfig {
  readonly rpcDialUrl: string;
  readonly rpcTimeoutMs: number;
  readonly jwtSecretPath: string;
}

export interface PayloadBuilderConfig {
  readonly enabled: boolean;
  readonly suggestedFeeRecipient: string;
}

export interface LoggerConfig {
  readonly timeFormat: string;
  readonly logLevel: LogLevel;
  readonly style: LogFormat;
}

/** app.toml */
export interface AppConfig {
  readonly pruning: PruningStrategy;
  readonly pruningKeepRecent: number;
  readonly pruningInterval: number;
  readonly haltHeight: number;
  readonly minRetainBlocks: number;
  readonly telemetry: TelemetryConfig;
  readonly engine: EngineConfig;
  readonly payloadBuilder: PayloadBuilderConfig;
  readonly logger: LoggerConfig;
}

export type DbBackend = "goleveldb" | "pebbledb" | "memdb";

export interface P2PConfig {
  readonly laddr: string;
  readonly persistentPeers: string;
  readonly maxNumInboundPeers: number;
  readonly maxNumOutboundPeers: number;
}

export interface RpcConfig {
  readonly laddr: string;
}

export interface ConsensusTimeouts {
  readonly timeoutPropose: string;
  readonly timeoutCommit: string;
}

/** config.toml */
export interface ConsensusConfig {
  readonly moniker: string;
  readonly dbBackend: DbBackend;
  readonly dbDir: string;
  readonly logLevel: LogLevel;
  readonly p2p: P2PConfig;
  readonly rpc: RpcConfig;
  readonly consensus: ConsensusTimeouts;
}

/** client.toml */
export interface ClientConfig {
  readonly chainId: string;
  readonly keyringBackend: KeyringBackend;
  readonly output: OutputFormat;
  readonly node: string;
  readonly broadcastMode: BroadcastMode;
}

/**
 * A config file template paired with the values it is rendered from.
 */
export interface ConfigTemplate<T> {
  readonly template: string;
  readonly defaults: T;
}
