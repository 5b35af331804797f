import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";
import { MemoryFileSystem } from "../testing/memory-fs";
import { addressFromPublicKey, generateKey, makeKeyring } from "./keyring";

const openTest = (fs: MemoryFileSystem) =>
  Effect.runSync(makeKeyring("test", "/node").pipe(Effect.provide(fs.layer())));

describe("generateKey", () => {
  it("should derive the address from the public key", () => {
    const key = generateKey("alice", new Date("2024-01-01T00:00:00.000Z"));

    expect(key.publicKey).toMatch(/^[0-9a-f]{64}$/);
    expect(key.address).toBe(addressFromPublicKey(Buffer.from(key.publicKey, "hex")));
    expect(key.address).toMatch(/^0x[0-9a-f]{40}$/);
    expect(key.createdAt).toBe("2024-01-01T00:00:00.000Z");
  });
});

describe("memory keyring", () => {
  it("should add, list, show and delete keys", async () => {
    const keyring = await Effect.runPromise(
      makeKeyring("memory", "").pipe(Effect.provide(new MemoryFileSystem().layer())),
    );

    const bob = await Effect.runPromise(keyring.add("bob"));
    const alice = await Effect.runPromise(keyring.add("alice"));

    expect((await Effect.runPromise(keyring.list())).map((key) => key.name)).toEqual(["alice", "bob"]);
    expect(await Effect.runPromise(keyring.get("bob"))).toEqual(bob);
    expect(alice).not.toHaveProperty("privateKey");

    await Effect.runPromise(keyring.remove("bob"));
    const missing = await Effect.runPromise(Effect.either(keyring.get("bob")));
    expect(Either.isLeft(missing) && missing.left.message).toBe('key "bob" not found');
  });

  it("should reject duplicate and invalid names", async () => {
    const keyring = await Effect.runPromise(
      makeKeyring("memory", "").pipe(Effect.provide(new MemoryFileSystem().layer())),
    );
    await Effect.runPromise(keyring.add("alice"));

    const duplicate = await Effect.runPromise(Effect.either(keyring.add("alice")));
    const invalid = await Effect.runPromise(Effect.either(keyring.add("../alice")));

    expect(Either.isLeft(duplicate) && duplicate.left.message).toBe('key "alice" already exists');
    expect(Either.isLeft(invalid) && invalid.left.message).toBe('invalid key name "../alice"');
  });
});

describe("test keyring", () => {
  it("should store keys as files under keyring-test", async () => {
    const fs = new MemoryFileSystem();
    const keyring = openTest(fs);

    const key = await Effect.runPromise(keyring.add("alice"));

    const stored = fs.files.get("/node/keyring-test/alice.json");
    expect(stored).toBeDefined();
    expect(JSON.parse(stored ?? "{}")).toMatchObject({ name: "alice", address: key.address });

    const reopened = openTest(fs);
    expect(await Effect.runPromise(reopened.list())).toEqual([key]);
  });

  it("should list nothing before the first key is added", async () => {
    expect(await Effect.runPromise(openTest(new MemoryFileSystem()).list())).toEqual([]);
  });

  it("should delete key files", async () => {
    const fs = new MemoryFileSystem();
    const keyring = openTest(fs);
    await Effect.runPromise(keyring.add("alice"));

    await Effect.runPromise(keyring.remove("alice"));

    expect(fs.files.has("/node/keyring-test/alice.json")).toBe(false);
    const again = await Effect.runPromise(Effect.either(keyring.remove("alice")));
    expect(Either.isLeft(again) && again.left.operation).toBe("get");
  });

  it("should report malformed key files", async () => {
    const fs = new MemoryFileSystem({ "/node/keyring-test/broken.json": '{"name":"broken"}' });

    const result = await Effect.runPromise(Effect.either(openTest(fs).get("broken")));

    expect(Either.isLeft(result) && result.left.message).toBe(
      "malformed key file /node/keyring-test/broken.json",
    );
  });
});
