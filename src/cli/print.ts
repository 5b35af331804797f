import type { Command } from "commander";
import type { OutputFormat } from "../core/interfaces/client-context";
import { jsonBigIntReplacer } from "../core/utils/logging-helpers";
import { outOrStdout } from "./command-output";

/**
 * Write a command result in the requested format
 */
export function printOutput(
  command: Command,
  format: OutputFormat,
  value: unknown,
  text: () => string,
): void {
  const out = outOrStdout(command);
  if (format === "json") {
    out.write(`${JSON.stringify(value, jsonBigIntReplacer)}\n`);
    return;
  }
  const rendered = text();
  out.write(rendered.endsWith("\n") ? rendered : `${rendered}\n`);
}
