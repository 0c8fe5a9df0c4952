/**
 * Zod schemas for input validation with TypeScript type inference
 *
 * Provides the shared AWS naming schemas reused by the command input
 * schemas, with automatic TypeScript type generation.
 *
 */

import { z } from "zod";

/**
 * Base schema for AWS region validation
 *
 * @public
 */
export const AwsRegionSchema = z
  .string()
  .min(1, "AWS region is required")
  .regex(
    /^[a-z]{2}(-[a-z]+)+-\d+$/,
    "AWS region must look like us-east-1 (lowercase letters, hyphens, trailing number)",
  );

/**
 * Schema for AWS profile name validation
 *
 * @public
 */
export const AwsProfileSchema = z.string().min(1, "AWS profile name is required");

/**
 * Port number validation (1-65535)
 *
 * @public
 */
export const PortNumberSchema = z
  .number()
  .int("Port must be an integer")
  .min(1, "Port must be at least 1")
  .max(65_535, "Port must be at most 65535");

