import { Command } from "commander";
import { Effect } from "effect";
import { z } from "zod";
import { commandEnv } from "../../cli/command-env";
import { printOutput } from "../../cli/print";
import { runCommandEffect } from "../../cli/run-command";
import type { ChainSpec } from "../../core/interfaces/chain-spec";
import type { AppModule } from "../../core/interfaces/module-manager";
import { GenesisError } from "../../core/types/errors";
import { genesisFile, readGenesis } from "../../genesis/genesis";

export const BEACON_MODULE = "beacon";

const beaconGenesisSchema = z.object({
  forkVersion: z.string().regex(/^0x[0-9a-f]{8}$/, "expected a 4-byte hex fork version"),
  depositContractAddress: z.string().regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte hex address"),
  slotsPerEpoch: z.number().int().positive(),
});

export type BeaconGenesis = z.infer<typeof beaconGenesisSchema>;

function defaultGenesis(chainSpec: ChainSpec): BeaconGenesis {
  return {
    forkVersion: chainSpec.genesisForkVersion,
    depositContractAddress: chainSpec.depositContractAddress,
    slotsPerEpoch: chainSpec.slotsPerEpoch,
  };
}

function validateGenesis(state: unknown, chainSpec: ChainSpec): Effect.Effect<void, GenesisError> {
  const result = beaconGenesisSchema.safeParse(state);
  if (!result.success) {
    const [issue] = result.error.issues;
    return Effect.fail(
      new GenesisError({
        module: BEACON_MODULE,
        path: issue ? issue.path.join(".") : "",
        message: issue?.message ?? "invalid beacon genesis",
      }),
    );
  }
  const actual = result.data;
  const expected = defaultGenesis(chainSpec);
  const mismatch = (["forkVersion", "depositContractAddress", "slotsPerEpoch"] as const).find(
    (field) => actual[field] !== expected[field],
  );
  if (mismatch !== undefined) {
    return Effect.fail(
      new GenesisError({
        module: BEACON_MODULE,
        path: mismatch,
        message: `${mismatch} ${String(actual[mismatch])} does not match chain spec ${chainSpec.name} (${String(expected[mismatch])})`,
      }),
    );
  }
  return Effect.void;
}

function queryCommand(): Command {
  const beacon = new Command(BEACON_MODULE).description("Query the beacon module");
  beacon
    .command("genesis")
    .description("Print the beacon section of the node's genesis")
    .action(async (_options: unknown, command: Command) => {
      await runCommandEffect(
        Effect.gen(function* () {
          const env = yield* commandEnv(command);
          const doc = yield* readGenesis(genesisFile(env.server.homeDir));
          const section = doc.appState[BEACON_MODULE];
          printOutput(command, env.client.outputFormat, section, () => JSON.stringify(section, null, 2));
        }),
      );
    });
  return beacon;
}

export const beaconModule: AppModule = {
  name: BEACON_MODULE,
  defaultGenesis,
  validateGenesis,
  commands: { query: queryCommand },
};
