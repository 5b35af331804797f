import { z } from "zod";
import type { AppConfig, ClientConfig, ConsensusConfig } from "../core/types/config";

/**
 * Validation schemas for the parsed (camel-cased) config files
 */

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const listenAddressSchema = z
  .string()
  .regex(/^tcp:\/\/[^\s:]+:\d{1,5}$/, "expected an address like tcp://0.0.0.0:26656");

const durationSchema = z
  .string()
  .regex(/^\d+(ms|s|m)$/, "expected a duration like 500ms, 3s or 1m");

export const appConfigSchema: z.ZodType<AppConfig> = z
  .object({
    pruning: z.enum(["default", "nothing", "everything", "custom"]),
    pruningKeepRecent: z.number().int().nonnegative(),
    pruningInterval: z.number().int().nonnegative(),
    haltHeight: z.number().int().nonnegative(),
    minRetainBlocks: z.number().int().nonnegative(),
    telemetry: z.object({
      enabled: z.boolean(),
      serviceName: z.string(),
    }),
    engine: z.object({
      rpcDialUrl: z.string().url(),
      rpcTimeoutMs: z.number().int().positive(),
      jwtSecretPath: z.string(),
    }),
    payloadBuilder: z.object({
      enabled: z.boolean(),
      suggestedFeeRecipient: z
        .string()
        .regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address"),
    }),
    logger: z.object({
      timeFormat: z.string(),
      logLevel: logLevelSchema,
      style: z.enum(["pretty", "json"]),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.pruning !== "custom") {
      return;
    }
    if (config.pruningKeepRecent === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pruningKeepRecent"],
        message: "custom pruning requires pruning-keep-recent to be greater than 0",
      });
    }
    if (config.pruningInterval < 10) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pruningInterval"],
        message: "custom pruning requires pruning-interval of at least 10",
      });
    }
  });

export const consensusConfigSchema: z.ZodType<ConsensusConfig> = z.object({
  moniker: z.string().min(1, "moniker must not be empty"),
  dbBackend: z.enum(["goleveldb", "pebbledb", "memdb"]),
  dbDir: z.string().min(1),
  logLevel: logLevelSchema,
  p2p: z.object({
    laddr: listenAddressSchema,
    persistentPeers: z.string(),
    maxNumInboundPeers: z.number().int().nonnegative(),
    maxNumOutboundPeers: z.number().int().nonnegative(),
  }),
  rpc: z.object({
    laddr: listenAddressSchema,
  }),
  consensus: z.object({
    timeoutPropose: durationSchema,
    timeoutCommit: durationSchema,
  }),
});

export const nodeUriSchema = z
  .string()
  .regex(/^(tcp|http|https):\/\/[^\s:]+:\d{1,5}$/, "expected a URI like tcp://localhost:26657");

export const clientConfigSchema: z.ZodType<ClientConfig> = z.object({
  chainId: z.string(),
  keyringBackend: z.enum(["memory", "test"]),
  output: z.enum(["text", "json"]),
  node: nodeUriSchema,
  broadcastMode: z.enum(["sync", "async"]),
});
