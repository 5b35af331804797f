import { Command } from "commander";
import { Effect, Either, Option } from "effect";
import { describe, expect, it } from "vitest";
import { noopTxConfig } from "../components/providers";
import {
  getClientContext,
  keyringDirectory,
  makeClientContext,
  readPersistentCommandFlags,
  setCommandClientContext,
} from "./context";
import { addPersistentFlags } from "./flags";

function commandTree() {
  const root = addPersistentFlags(new Command("testd"), "/home/test/.testd");
  const run = root.command("run").action(() => undefined);
  return { root, run };
}

async function parsed(args: string[]) {
  const tree = commandTree();
  await tree.root.parseAsync(args, { from: "user" });
  return tree;
}

describe("readPersistentCommandFlags", () => {
  const base = makeClientContext("/base/home", noopTxConfig);

  it("should keep the context when no flag is given", async () => {
    const { run } = await parsed(["run"]);

    const ctx = await Effect.runPromise(readPersistentCommandFlags(base, run));

    expect(ctx).toEqual(base);
  });

  it("should fill an empty home from the flag default", async () => {
    const { run } = await parsed(["run"]);

    const ctx = await Effect.runPromise(
      readPersistentCommandFlags(makeClientContext("", noopTxConfig), run),
    );

    expect(ctx.homeDir).toBe("/home/test/.testd");
    expect(ctx.flagOverrides).toEqual([]);
  });

  it("should apply explicit flags and record them as overrides", async () => {
    const { run } = await parsed([
      "run",
      "--chain-id",
      "test-1",
      "--home",
      "/srv/node",
      "-o",
      "json",
      "--offline",
    ]);

    const ctx = await Effect.runPromise(readPersistentCommandFlags(base, run));

    expect(ctx.chainId).toBe("test-1");
    expect(ctx.homeDir).toBe("/srv/node");
    expect(ctx.outputFormat).toBe("json");
    expect(ctx.offline).toBe(true);
    expect(ctx.flagOverrides).toEqual(["home", "chain-id", "output", "offline"]);
    expect(base.chainId).toBe("");
    expect(base.flagOverrides).toEqual([]);
  });

  it("should read flags given before the subcommand", async () => {
    const { run } = await parsed(["--keyring-backend", "memory", "--from", "alice", "run"]);

    const ctx = await Effect.runPromise(readPersistentCommandFlags(base, run));

    expect(ctx.keyringBackend).toBe("memory");
    expect(ctx.fromName).toBe("alice");
    expect(ctx.flagOverrides).toEqual(["keyring-backend", "from"]);
  });

  it("should reject an unknown keyring backend", async () => {
    const { run } = await parsed(["run", "--keyring-backend", "os"]);

    const result = await Effect.runPromise(Effect.either(readPersistentCommandFlags(base, run)));

    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("FlagParseError");
      expect(result.left.flag).toBe("keyring-backend");
      expect(result.left.value).toBe("os");
      expect(result.left.message).toBe("invalid value for --keyring-backend: expected one of memory, test");
    }
  });

  it("should reject a malformed node URI", async () => {
    const { run } = await parsed(["run", "--node", "localhost"]);

    const result = await Effect.runPromise(Effect.either(readPersistentCommandFlags(base, run)));

    expect(Either.isLeft(result) && result.left.message).toBe(
      "invalid value for --node: expected a URI like tcp://localhost:26657",
    );
  });

  it("should use the keyring directory when set, the home otherwise", () => {
    expect(keyringDirectory(base)).toBe("/base/home");
    expect(keyringDirectory({ ...base, keyringDir: "/keys" })).toBe("/keys");
  });
});

describe("client context storage", () => {
  it("should be visible from subcommands of the command it was set on", async () => {
    const { root, run } = commandTree();
    const ctx = makeClientContext("/base/home", noopTxConfig);

    await Effect.runPromise(setCommandClientContext(ctx, root));

    expect(getClientContext(run)).toEqual(Option.some(ctx));
  });

  it("should be absent when no command in the chain carries one", () => {
    const { run } = commandTree();

    expect(Option.isNone(getClientContext(run))).toBe(true);
  });
});
