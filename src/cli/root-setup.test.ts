import { Command } from "commander";
import { Effect, Either, Option } from "effect";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { appDependencyConfig } from "../app/components";
import { defaultAppCreator } from "../app/application";
import { withAppCreator, withDependencyConfig, withLoggerOutput, withName, withSettings } from "../builder/options";
import { newNodeBuilder } from "../builder/builder";
import { CHAIN_SPECS } from "../components/chain-spec";
import type { AppCreator } from "../core/interfaces/application";
import { newNode } from "../node/node";
import { createModuleManager } from "../services/module-manager";
import { SettingsStoreImpl } from "../services/settings";
import { BufferSink } from "../testing/buffer-sink";
import { setCommandOutput } from "./command-output";
import { defaultRootCommandSetup } from "./root-setup";

let home = "";

async function invoke(args: readonly string[], appCreator: AppCreator = defaultAppCreator) {
  const out = new BufferSink();
  const err = new BufferSink();
  const node = await Effect.runPromise(
    newNodeBuilder(
      newNode,
      withName("testd"),
      withDependencyConfig(appDependencyConfig()),
      withSettings(new SettingsStoreImpl({}, {})),
      withLoggerOutput(err),
      withAppCreator(appCreator),
    ).build(),
  );
  setCommandOutput(Option.getOrThrow(node.rootCommand()), { out, err });
  await node.run(["node", "testd", ...args, "--home", home]);
  return { out, err };
}

beforeEach(() => {
  home = fs.mkdtempSync(path.join(os.tmpdir(), "nodekit-cli-"));
  vi.stubEnv("CHAIN_SPEC", "devnet");
});

afterEach(() => {
  vi.unstubAllEnvs();
  fs.rmSync(home, { recursive: true, force: true });
});

describe("init", () => {
  it("should write the configuration and a genesis file", async () => {
    const { out, err } = await invoke(["init", "val-1"]);

    const genesis = path.join(home, "config", "genesis.json");
    expect(out.text()).toBe(
      ["moniker:  val-1", "chain-id: nodekit-devnet-1", `genesis:  ${genesis}`, ""].join("\n"),
    );
    expect(fs.readFileSync(path.join(home, "config", "config.toml"), "utf8")).toContain('moniker = "val-1"');
    expect(JSON.parse(fs.readFileSync(genesis, "utf8"))).toMatchObject({
      chainId: "nodekit-devnet-1",
      chainSpec: "devnet",
      appState: { staking: { validators: [] } },
    });
    expect(err.lines().some((line) => line.includes("[server] initialized node moniker=val-1"))).toBe(true);
  });

  it("should refuse to replace an existing genesis without --overwrite", async () => {
    await invoke(["init", "val-1"]);

    await expect(invoke(["init", "val-2"])).rejects.toMatchObject({
      _tag: "GenesisError",
      suggestion: "Pass --overwrite to replace it",
    });
    const { out } = await invoke(["init", "val-2", "--overwrite"]);
    expect(out.lines()[0]).toBe("moniker:  val-2");
  });
});

describe("genesis validate", () => {
  it("should accept the genesis written by init", async () => {
    await invoke(["init", "val-1"]);

    const { out } = await invoke(["genesis", "validate"]);

    expect(out.text()).toBe(`File at ${path.join(home, "config", "genesis.json")} is a valid genesis file\n`);
  });

  it("should reject a genesis written for another chain spec", async () => {
    await invoke(["init", "val-1"]);
    vi.stubEnv("CHAIN_SPEC", "testnet");

    await expect(invoke(["genesis", "validate"])).rejects.toMatchObject({
      _tag: "GenesisError",
      message: 'genesis was created for chain spec "devnet", node runs "testnet"',
    });
  });

  it("should report a missing genesis file", async () => {
    await expect(invoke(["genesis", "validate"])).rejects.toMatchObject({ _tag: "GenesisError" });
  });
});

describe("keys", () => {
  it("should add, list, show and delete keys in the test keyring", async () => {
    const added = await invoke(["keys", "add", "alice", "-o", "json"]);
    const alice: unknown = JSON.parse(added.out.text());
    expect(alice).toMatchObject({ name: "alice", algorithm: "ed25519" });

    const listed = await invoke(["keys", "list", "-o", "json"]);
    expect(JSON.parse(listed.out.text())).toEqual([alice]);

    const address = await invoke(["keys", "show", "alice", "-a"]);
    expect(address.out.text()).toMatch(/^0x[0-9a-f]{40}\n$/);
    expect(alice).toMatchObject({ address: address.out.text().trim() });

    const deleted = await invoke(["keys", "delete", "alice"]);
    expect(deleted.out.text()).toBe('Key "alice" deleted\n');

    const empty = await invoke(["keys", "ls"]);
    expect(empty.out.text()).toBe("No keys found\n");
  });

  it("should fail for an unknown key", async () => {
    await expect(invoke(["keys", "show", "ghost"])).rejects.toMatchObject({
      _tag: "KeyringError",
      message: 'key "ghost" not found',
    });
  });

  it("should reject an unsupported keyring backend", async () => {
    await expect(invoke(["keys", "list", "--keyring-backend", "os"])).rejects.toMatchObject({
      _tag: "FlagParseError",
      flag: "keyring-backend",
      message: "invalid value for --keyring-backend: expected one of memory, test",
    });
  });
});

describe("module commands", () => {
  it("should list no genesis validators after init", async () => {
    await invoke(["init", "val-1"]);

    const { out } = await invoke(["query", "staking", "validators"]);

    expect(out.text()).toBe("No validators\n");
  });

  it("should encode a create-validator transaction", async () => {
    await invoke(["keys", "add", "alice"]);

    const { out } = await invoke([
      "tx",
      "staking",
      "create-validator",
      "32000000000",
      "--from",
      "alice",
      "--chain-id",
      "devnet-3",
      "-o",
      "json",
    ]);

    const printed: unknown = JSON.parse(out.text());
    expect(printed).toMatchObject({
      tx: { type: "staking/create-validator", chainId: "devnet-3", amount: 32000000000 },
    });
    if (typeof printed === "object" && printed !== null && "encoded" in printed && "tx" in printed) {
      expect(typeof printed.encoded).toBe("string");
      expect(JSON.parse(Buffer.from(String(printed.encoded), "hex").toString("utf8"))).toEqual(printed.tx);
    }
  });
});

describe("start", () => {
  it("should run the application and close it", async () => {
    await invoke(["init", "val-1"]);
    const events: string[] = [];
    const appCreator: AppCreator = (options) =>
      Effect.sync(() => {
        events.push(`create ${options.chainSpec.name} ${options.moduleManager.moduleNames().join(",")}`);
        return {
          name: "stub",
          start: () => Effect.sync(() => void events.push("start")),
          close: () => Effect.sync(() => void events.push("close")),
        };
      });

    const { err } = await invoke(["start"], appCreator);

    expect(events).toEqual(["create devnet beacon,staking", "start", "close"]);
    expect(err.lines().some((line) => line.includes("[server] starting node chainId=nodekit-devnet-1"))).toBe(
      true,
    );
  });

  it("should not create the application without a genesis file", async () => {
    let created = false;
    const appCreator: AppCreator = () =>
      Effect.sync(() => {
        created = true;
        return { name: "stub", start: () => Effect.void, close: () => Effect.void };
      });

    await expect(invoke(["start"], appCreator)).rejects.toMatchObject({ _tag: "GenesisError" });
    expect(created).toBe(false);
  });
});

describe("version and config", () => {
  it("should print the version", async () => {
    const { out } = await invoke(["version", "-o", "json"]);

    expect(JSON.parse(out.text())).toEqual({ name: "testd", version: "0.1.0" });
  });

  it("should print the effective configuration", async () => {
    const { out } = await invoke(["config", "show", "-o", "json"]);

    expect(JSON.parse(out.text())).toMatchObject({ home });
  });

  it("should fail every invocation on an invalid app.toml", async () => {
    fs.mkdirSync(path.join(home, "config"), { recursive: true });
    fs.writeFileSync(path.join(home, "config", "app.toml"), "minimum-gas-prices = [\n");

    await expect(invoke(["version"])).rejects.toMatchObject({ _tag: "ConfigurationError" });
  });
});

describe("defaultRootCommandSetup", () => {
  it("should fail when a default command name is already taken", () => {
    const root = new Command("r");
    root.command("start");
    const moduleManager = Effect.runSync(createModuleManager([]));

    const result = Effect.runSync(
      Effect.either(defaultRootCommandSetup(root, moduleManager, defaultAppCreator, CHAIN_SPECS.devnet)),
    );

    expect(Either.isLeft(result) && result.left).toMatchObject({
      command: "r start",
      message: '"start" is already registered on r',
    });
    expect(root.commands.map((command) => command.name())).toEqual(["start"]);
  });
});
