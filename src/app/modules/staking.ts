import type { FileSystem } from "@effect/platform";
import { Command } from "commander";
import { Effect } from "effect";
import { z } from "zod";
import { commandEnv } from "../../cli/command-env";
import { printOutput } from "../../cli/print";
import { runCommandEffect } from "../../cli/run-command";
import { keyringDirectory } from "../../client/context";
import type { ChainSpec } from "../../core/interfaces/chain-spec";
import type { ClientContext } from "../../core/interfaces/client-context";
import type { AppModule } from "../../core/interfaces/module-manager";
import { FlagParseError, GenesisError, KeyringError } from "../../core/types/errors";
import { genesisFile, readGenesis } from "../../genesis/genesis";
import { makeKeyring } from "../../services/keyring";

export const STAKING_MODULE = "staking";

const validatorSchema = z.object({
  pubkey: z.string().regex(/^[0-9a-f]{64}$/, "expected a 32-byte hex public key"),
  amount: z.number().int().positive(),
});

const stakingGenesisSchema = z.object({
  validators: z.array(validatorSchema),
});

export type StakingGenesis = z.infer<typeof stakingGenesisSchema>;

export interface CreateValidatorTx {
  readonly type: "staking/create-validator";
  readonly chainId: string;
  readonly delegator: string;
  readonly pubkey: string;
  readonly amount: number;
}

function validateGenesis(state: unknown, chainSpec: ChainSpec): Effect.Effect<void, GenesisError> {
  const result = stakingGenesisSchema.safeParse(state);
  if (!result.success) {
    const [issue] = result.error.issues;
    return Effect.fail(
      new GenesisError({
        module: STAKING_MODULE,
        path: issue ? issue.path.join(".") : "",
        message: issue?.message ?? "invalid staking genesis",
      }),
    );
  }

  const { validators } = result.data;
  const fail = (path: string, message: string) =>
    Effect.fail(new GenesisError({ module: STAKING_MODULE, path, message }));

  if (validators.length > chainSpec.validatorSetCap) {
    return fail(
      "validators",
      `${validators.length} validators exceed the validator set cap of ${chainSpec.validatorSetCap}`,
    );
  }
  const seen = new Set<string>();
  for (const [index, validator] of validators.entries()) {
    if (seen.has(validator.pubkey)) {
      return fail(`validators.${index}.pubkey`, `duplicate validator ${validator.pubkey}`);
    }
    seen.add(validator.pubkey);
    if (validator.amount < chainSpec.minDepositAmount) {
      return fail(
        `validators.${index}.amount`,
        `deposit ${validator.amount} is below the minimum of ${chainSpec.minDepositAmount}`,
      );
    }
    if (validator.amount > chainSpec.maxEffectiveBalance) {
      return fail(
        `validators.${index}.amount`,
        `deposit ${validator.amount} exceeds the maximum effective balance of ${chainSpec.maxEffectiveBalance}`,
      );
    }
  }
  return Effect.void;
}

/**
 * Build an unsigned create-validator transaction for the key named by --from
 */
export function createValidatorTx(
  ctx: ClientContext,
  amount: string,
): Effect.Effect<CreateValidatorTx, FlagParseError | KeyringError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    if (ctx.fromName === "") {
      return yield* Effect.fail(
        new FlagParseError({
          flag: "from",
          value: "",
          message: "--from is required to build a transaction",
          suggestion: "Pass --from <key name>",
        }),
      );
    }
    const parsed = z.coerce.number().int().positive().safeParse(amount);
    if (!parsed.success) {
      return yield* Effect.fail(
        new FlagParseError({
          flag: "amount",
          value: amount,
          message: `invalid amount "${amount}": expected a positive integer in gwei`,
        }),
      );
    }
    const keyring = yield* makeKeyring(ctx.keyringBackend, keyringDirectory(ctx));
    const key = yield* keyring.get(ctx.fromName);
    return {
      type: "staking/create-validator",
      chainId: ctx.chainId,
      delegator: key.address,
      pubkey: key.publicKey,
      amount: parsed.data,
    };
  });
}

function queryCommand(): Command {
  const staking = new Command(STAKING_MODULE).description("Query the staking module");
  staking
    .command("validators")
    .description("List the genesis validators")
    .action(async (_options: unknown, command: Command) => {
      await runCommandEffect(
        Effect.gen(function* () {
          const env = yield* commandEnv(command);
          const doc = yield* readGenesis(genesisFile(env.server.homeDir));
          const parsed = stakingGenesisSchema.safeParse(doc.appState[STAKING_MODULE]);
          const validators = parsed.success ? parsed.data.validators : [];
          printOutput(command, env.client.outputFormat, validators, () =>
            validators.length === 0
              ? "No validators"
              : validators.map((v) => `${v.pubkey} ${v.amount}`).join("\n"),
          );
        }),
      );
    });
  return staking;
}

function txCommand(): Command {
  const staking = new Command(STAKING_MODULE).description("Staking transactions");
  staking
    .command("create-validator <amount>")
    .description("Generate an unsigned transaction staking <amount> gwei with the --from key")
    .action(async (amount: string, _options: unknown, command: Command) => {
      await runCommandEffect(
        Effect.gen(function* () {
          const env = yield* commandEnv(command);
          const tx = yield* createValidatorTx(env.client, amount);
          const encoded = Buffer.from(env.client.txConfig.encode(tx)).toString("hex");
          printOutput(command, env.client.outputFormat, { tx, encoded }, () => encoded);
        }),
      );
    });
  return staking;
}

export const stakingModule: AppModule = {
  name: STAKING_MODULE,
  defaultGenesis: (): StakingGenesis => ({ validators: [] }),
  validateGenesis,
  commands: { query: queryCommand, tx: txCommand },
};
