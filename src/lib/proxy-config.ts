/**
 * @module proxy-config
 * Proxy parameter assembly
 *
 * Merges validated command input with the resolved host attributes and the
 * public key file content into the single parameter set the rest of the run
 * works from.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { ConfigurationError, describeError } from "./errors.js";
import { resolveHostAttributes, type InstanceTarget } from "./host-pattern.js";
import type { ProxyInput } from "./proxy-schemas.js";

/**
 * Parameters for one proxy run
 *
 * @public
 */
export interface ProxyParameters {
  readonly target: InstanceTarget;
  readonly profile?: string | undefined;
  readonly region?: string | undefined;
  readonly user: string;
  readonly port: number;
  readonly publicKey: string;
}

/**
 * Expand a leading `~` to the caller's home directory
 *
 * @param filePath - Path as given on the command line
 * @param resolveHome - Home directory lookup
 * @returns Path with the home directory substituted
 * @throws \{ConfigurationError\} When the home directory cannot be determined
 *
 * @public
 */
export function expandHomePath(filePath: string, resolveHome: () => string = homedir): string {
  if (filePath !== "~" && !filePath.startsWith("~/")) {
    return filePath;
  }

  let home: string;
  try {
    home = resolveHome();
  } catch (error) {
    throw new ConfigurationError(
      `Cannot determine home directory to expand ${filePath}: ${describeError(error)}`,
      "publicKeyPath",
      filePath,
      error,
    );
  }

  if (!home) {
    throw new ConfigurationError(
      `Cannot determine home directory to expand ${filePath}`,
      "publicKeyPath",
      filePath,
    );
  }

  return path.join(home, filePath.slice(2));
}

/**
 * Read an SSH public key file fully into memory
 *
 * @param keyPath - Path to the public key, `~` allowed
 * @returns File content
 * @throws \{ConfigurationError\} When the file cannot be read
 *
 * @public
 */
export async function readPublicKey(keyPath: string): Promise<string> {
  const resolvedPath = expandHomePath(keyPath);

  try {
    return await readFile(resolvedPath, "utf8");
  } catch (error) {
    const errno = error instanceof Error && "code" in error ? error.code : undefined;
    throw new ConfigurationError(
      `SSH public key file could not be read: ${resolvedPath} (${describeError(error)})`,
      "publicKeyPath",
      resolvedPath,
      error,
      { code: errno },
    );
  }
}

/**
 * Build the parameter set for a proxy run
 *
 * Reads the public key, then resolves the host token. An explicit profile
 * flag wins over a profile captured from the host token.
 *
 * @param input - Validated command input
 * @returns Frozen proxy parameters
 *
 * @public
 */
export async function buildProxyParameters(input: ProxyInput): Promise<ProxyParameters> {
  const publicKey = await readPublicKey(input.publicKeyPath);
  const host = resolveHostAttributes(input.host, input.pattern);

  return Object.freeze({
    target: host.target,
    profile: input.profile ?? host.profile,
    region: input.region,
    user: input.user,
    port: input.port,
    publicKey,
  });
}
