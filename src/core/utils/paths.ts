import os from "node:os";
import path from "node:path";

/**
 * Expand a leading "~" to the user's home directory
 */
export function expandHome(p: string): string {
  if (p === "~" || p.startsWith("~/")) {
    const home = process.env["HOME"] || process.env["USERPROFILE"] || os.homedir();
    return home ? path.join(home, p.slice(1)) : p;
  }
  return p;
}

/**
 * Default home directory of a node binary: `~/.<name>`
 */
export function defaultNodeHome(name: string): string {
  return path.join(os.homedir(), `.${name}`);
}
