/**
 * @module proxy-schemas
 * Proxy command Zod schemas
 *
 * Validates the ProxyCommand arguments and flags after oclif has parsed
 * them, before anything is read from disk or sent to AWS.
 */

import { z } from "zod";
import { AwsProfileSchema, AwsRegionSchema, PortNumberSchema } from "./schemas.js";

/**
 * Default values for the proxy command
 *
 * Populated once at startup and never mutated.
 *
 * @public
 */
export const PROXY_DEFAULTS = Object.freeze({
  pattern: "ec2.{name}",
  user: "ec2-user",
  publicKeyPath: "~/.ssh/id_rsa.pub",
});

/**
 * OS login name on the instance
 *
 * Same constraint as the InstanceOSUser field of SendSSHPublicKey.
 *
 * @public
 */
export const OsUserSchema = z
  .string()
  .min(1, "OS user is required")
  .max(32, "OS user must be 32 characters or less")
  .regex(
    /^[A-Za-z_][A-Za-z0-9@._-]{0,30}[A-Za-z0-9$_-]?$/,
    "OS user must start with a letter or underscore and contain only letters, numbers, '@', '.', '_', '-' or a trailing '$'",
  );

/**
 * Proxy command input validation
 *
 * @public
 */
export const ProxyInputSchema = z.object({
  host: z.string().min(1, "Host is required"),
  port: PortNumberSchema,
  pattern: z.string().min(1, "Host name pattern is required").default(PROXY_DEFAULTS.pattern),
  profile: AwsProfileSchema.optional(),
  region: AwsRegionSchema.optional(),
  publicKeyPath: z
    .string()
    .min(1, "Public key path is required")
    .default(PROXY_DEFAULTS.publicKeyPath),
  user: OsUserSchema.default(PROXY_DEFAULTS.user),
  verbose: z.boolean().default(false),
});

/**
 * Proxy command input type
 *
 * @public
 */
export type ProxyInput = z.infer<typeof ProxyInputSchema>;
