import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { createHash, generateKeyPairSync } from "node:crypto";
import path from "node:path";
import { z } from "zod";
import type { KeyRecord, Keyring, KeyringBackend } from "../core/interfaces/keyring";
import { KeyringError } from "../core/types/errors";
import { parseJson } from "../core/utils/json";

/**
 * Keyring backends.
 *
 * `memory` keeps keys for the lifetime of the process. `test` stores unencrypted
 * key files under `<dir>/keyring-test` and must only be used for development.
 */

const KEY_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const storedKeySchema = z.object({
  name: z.string(),
  algorithm: z.literal("ed25519"),
  address: z.string(),
  publicKey: z.string(),
  createdAt: z.string(),
  privateKey: z.string(),
});

type StoredKey = z.infer<typeof storedKeySchema>;

/**
 * Generate a fresh ed25519 key. The address is the first 20 bytes of the
 * SHA-256 of the raw public key.
 */
export function generateKey(name: string, now: Date = new Date()): StoredKey {
  const { publicKey, privateKey } = generateKeyPairSync("ed25519");
  const spki = publicKey.export({ format: "der", type: "spki" });
  // ed25519 SPKI is a fixed 12-byte header followed by the 32-byte key
  const raw = spki.subarray(spki.length - 32);
  return {
    name,
    algorithm: "ed25519",
    address: addressFromPublicKey(raw),
    publicKey: raw.toString("hex"),
    createdAt: now.toISOString(),
    privateKey: privateKey.export({ format: "der", type: "pkcs8" }).toString("hex"),
  };
}

export function addressFromPublicKey(raw: Uint8Array): string {
  return `0x${createHash("sha256").update(raw).digest().subarray(0, 20).toString("hex")}`;
}

function toRecord(key: StoredKey): KeyRecord {
  const { privateKey: _privateKey, ...record } = key;
  return record;
}

function validateName(backend: KeyringBackend, name: string): Effect.Effect<string, KeyringError> {
  return KEY_NAME_PATTERN.test(name)
    ? Effect.succeed(name)
    : Effect.fail(
        new KeyringError({
          backend,
          operation: "validate",
          keyName: name,
          message: `invalid key name "${name}"`,
          suggestion: "Use 1-64 letters, digits, underscores or dashes",
        }),
      );
}

function notFound(backend: KeyringBackend, name: string): KeyringError {
  return new KeyringError({
    backend,
    operation: "get",
    keyName: name,
    message: `key "${name}" not found`,
    suggestion: "List available keys with the `keys list` command",
  });
}

function alreadyExists(backend: KeyringBackend, name: string): KeyringError {
  return new KeyringError({
    backend,
    operation: "add",
    keyName: name,
    message: `key "${name}" already exists`,
  });
}

export class MemoryKeyring implements Keyring {
  readonly backend = "memory" as const;
  readonly dir = "";
  private readonly keys = new Map<string, StoredKey>();

  list(): Effect.Effect<readonly KeyRecord[], KeyringError> {
    return Effect.sync(() =>
      [...this.keys.values()].map(toRecord).sort((a, b) => a.name.localeCompare(b.name)),
    );
  }

  get(name: string): Effect.Effect<KeyRecord, KeyringError> {
    return Effect.suspend(() => {
      const key = this.keys.get(name);
      return key ? Effect.succeed(toRecord(key)) : Effect.fail(notFound(this.backend, name));
    });
  }

  add(name: string): Effect.Effect<KeyRecord, KeyringError> {
    return Effect.flatMap(validateName(this.backend, name), (valid) =>
      Effect.suspend(() => {
        if (this.keys.has(valid)) {
          return Effect.fail(alreadyExists(this.backend, valid));
        }
        const key = generateKey(valid);
        this.keys.set(valid, key);
        return Effect.succeed(toRecord(key));
      }),
    );
  }

  remove(name: string): Effect.Effect<void, KeyringError> {
    return Effect.suspend(() =>
      this.keys.delete(name) ? Effect.void : Effect.fail(notFound(this.backend, name)),
    );
  }
}

export class FileKeyring implements Keyring {
  readonly backend = "test" as const;
  private readonly keysDir: string;

  constructor(
    readonly dir: string,
    private readonly fs: FileSystem.FileSystem,
  ) {
    this.keysDir = path.join(dir, "keyring-test");
  }

  list(): Effect.Effect<readonly KeyRecord[], KeyringError> {
    const self = this;
    return Effect.gen(function* () {
      const exists = yield* self.fs
        .exists(self.keysDir)
        .pipe(Effect.mapError((error) => self.ioError("list", String(error))));
      if (!exists) {
        return [];
      }
      const entries = yield* self.fs
        .readDirectory(self.keysDir)
        .pipe(Effect.mapError((error) => self.ioError("list", String(error))));
      const names = entries
        .filter((entry) => entry.endsWith(".json"))
        .map((entry) => entry.slice(0, -".json".length))
        .sort((a, b) => a.localeCompare(b));
      return yield* Effect.forEach(names, (name) => self.get(name));
    });
  }

  get(name: string): Effect.Effect<KeyRecord, KeyringError> {
    return this.read(name).pipe(Effect.map(toRecord));
  }

  add(name: string): Effect.Effect<KeyRecord, KeyringError> {
    const self = this;
    return Effect.gen(function* () {
      const valid = yield* validateName(self.backend, name);
      const file = self.keyFile(valid);
      const exists = yield* self.fs
        .exists(file)
        .pipe(Effect.mapError((error) => self.ioError("add", String(error), valid)));
      if (exists) {
        return yield* Effect.fail(alreadyExists(self.backend, valid));
      }
      const key = generateKey(valid);
      yield* self.fs
        .makeDirectory(self.keysDir, { recursive: true })
        .pipe(Effect.mapError((error) => self.ioError("add", String(error), valid)));
      yield* self.fs
        .writeFileString(file, `${JSON.stringify(key, null, 2)}\n`)
        .pipe(Effect.mapError((error) => self.ioError("add", String(error), valid)));
      return toRecord(key);
    });
  }

  remove(name: string): Effect.Effect<void, KeyringError> {
    return Effect.flatMap(this.read(name), () =>
      this.fs
        .remove(this.keyFile(name))
        .pipe(Effect.mapError((error) => this.ioError("delete", String(error), name))),
    );
  }

  private read(name: string): Effect.Effect<StoredKey, KeyringError> {
    const self = this;
    return Effect.gen(function* () {
      const valid = yield* validateName(self.backend, name);
      const file = self.keyFile(valid);
      const exists = yield* self.fs
        .exists(file)
        .pipe(Effect.mapError((error) => self.ioError("get", String(error), valid)));
      if (!exists) {
        return yield* Effect.fail(notFound(self.backend, valid));
      }
      const content = yield* self.fs
        .readFileString(file)
        .pipe(Effect.mapError((error) => self.ioError("get", String(error), valid)));
      const parsed = yield* parseJson(content).pipe(
        Effect.mapError((error) => self.ioError("get", error.message, valid)),
      );
      const result = storedKeySchema.safeParse(parsed);
      if (!result.success) {
        return yield* Effect.fail(self.ioError("get", `malformed key file ${file}`, valid));
      }
      return result.data;
    });
  }

  private keyFile(name: string): string {
    return path.join(this.keysDir, `${name}.json`);
  }

  private ioError(operation: string, message: string, keyName?: string): KeyringError {
    return new KeyringError({
      backend: this.backend,
      operation,
      message,
      ...(keyName !== undefined ? { keyName } : {}),
    });
  }
}

/**
 * Open a keyring for the given backend. The test backend keeps its files
 * below `dir`.
 */
export function makeKeyring(
  backend: KeyringBackend,
  dir: string,
): Effect.Effect<Keyring, never, FileSystem.FileSystem> {
  if (backend === "memory") {
    return Effect.sync(() => new MemoryKeyring());
  }
  return Effect.map(FileSystem.FileSystem, (fs) => new FileKeyring(dir, fs));
}
