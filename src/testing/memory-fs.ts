import { FileSystem } from "@effect/platform";
import { SystemError } from "@effect/platform/Error";
import { Effect, Layer } from "effect";
import path from "node:path";

/**
 * In-memory file system for tests. Only the operations the node uses are
 * implemented; everything else fails as with `FileSystem.layerNoop`.
 */
export class MemoryFileSystem {
  readonly files = new Map<string, string>();
  readonly directories = new Set<string>();

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [file, content] of Object.entries(initial)) {
      this.files.set(file, content);
      this.addDirectory(path.dirname(file));
    }
  }

  layer(): Layer.Layer<FileSystem.FileSystem> {
    return FileSystem.layerNoop({
      exists: (p) => Effect.sync(() => this.files.has(p) || this.directories.has(p)),
      readFileString: (p) =>
        Effect.suspend(() => {
          const content = this.files.get(p);
          return content === undefined
            ? Effect.fail(notFound("readFileString", p))
            : Effect.succeed(content);
        }),
      writeFileString: (p, data) =>
        Effect.sync(() => {
          this.files.set(p, data);
        }),
      makeDirectory: (p) =>
        Effect.sync(() => {
          this.addDirectory(p);
        }),
      readDirectory: (p) =>
        Effect.sync(() =>
          [...this.files.keys()].filter((file) => path.dirname(file) === p).map((file) => path.basename(file)),
        ),
      remove: (p) =>
        Effect.suspend(() =>
          this.files.delete(p) ? Effect.void : Effect.fail(notFound("remove", p)),
        ),
    });
  }

  private addDirectory(dir: string): void {
    for (let current = dir; !this.directories.has(current); current = path.dirname(current)) {
      this.directories.add(current);
      if (path.dirname(current) === current) {
        break;
      }
    }
  }
}

function notFound(method: string, p: string): SystemError {
  return new SystemError({
    reason: "NotFound",
    module: "FileSystem",
    method,
    pathOrDescriptor: p,
  });
}
