#!/usr/bin/env node
/**
 * CLI bootstrap entrypoint.
 *
 * Runs before the rest of the node is loaded so the Node.js process can be
 * configured (e.g. suppress noisy deprecation warnings from transitive
 * dependencies) prior to importing the main module and its dependency tree.
 */

process.noDeprecation = true;

void import("./main").catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exitCode = 1;
});
