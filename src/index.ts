#!/usr/bin/env node

/**
 * ec2-ssh-proxy - Main entry point
 *
 * Oclif single-command CLI meant to be run by ssh as a ProxyCommand.
 *
 */

import { execute } from "@oclif/core";

/**
 * CLI application entry point
 */
async function run(): Promise<void> {
  await execute({ dir: import.meta.url });
}

/**
 * Catches errors that escape the Oclif error handling system so they are
 * reported on stderr with a non-zero exit code.
 */
try {
  await run();
} catch (error: unknown) {
  const { handle } = await import("@oclif/core/handle");
  await handle(error instanceof Error ? error : new Error(String(error)));
}
