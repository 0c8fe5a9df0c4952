/**
 * Error categorization system for the SSH proxy
 *
 * Provides structured error types with consistent error codes and user-friendly
 * messages. Integrates with Oclif's error handling mechanisms while keeping
 * the host, instance, session, and transport failures apart.
 *
 * @file
 * This module holds the shared part of the error hierarchy:
 *
 * **Core Error Types:**
 * - BaseError: Abstract base class for all proxy errors
 * - ConfigurationError: Unusable local configuration (home directory, key file)
 * - RemoteError: Any failure reported by an AWS API or credential resolution
 *
 * Pipeline-specific errors live beside the stage that raises them
 * (`host-errors.ts`, `ec2-errors.ts`, `ssm/ssm-errors.ts`).
 *
 * **Security Features:**
 * - Metadata sanitization for verbose output (session tokens never printed)
 * - Resolution guidance keyed by error code
 */

import { getErrorGuidance } from "./error-guidance.js";
import { sanitizeErrorForVerboseOutput } from "./error-sanitization.js";

/**
 * Base error class for all proxy errors
 *
 * Extends the standard Error class with error codes and structured
 * metadata for consistent error handling across the application.
 *
 * @public
 */
export abstract class BaseError extends Error {
  /**
   * Unique error code for this error type
   */
  public readonly code: string;

  /**
   * Additional error metadata
   */
  public readonly metadata: Record<string, unknown>;

  /**
   * Create a new base error
   *
   * @param message - Human-readable error message
   * @param code - Unique error code
   * @param metadata - Additional error context
   */
  constructor(message: string, code: string, metadata: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Configuration error for invalid or missing local configuration
 *
 * Raised before any network call when the public key path cannot be
 * expanded or the key file cannot be read. Never retried.
 *
 * @public
 */
export class ConfigurationError extends BaseError {
  /**
   * Create a new configuration error
   *
   * @param message - User-friendly configuration error message
   * @param configKey - The configuration key that is invalid or missing
   * @param actualValue - The configuration value found
   * @param cause - The underlying error, typically a file system error
   * @param metadata - Additional configuration context
   */
  constructor(
    message: string,
    configKey?: string,
    actualValue?: unknown,
    cause?: unknown,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "CONFIGURATION_ERROR", {
      configKey,
      actualValue,
      cause,
      ...metadata,
    });
  }
}

/**
 * Remote error for AWS API and credential failures
 *
 * Wraps whatever an AWS SDK client (or the credential provider chain)
 * rejected with. The original error is kept as `cause` and the HTTP status
 * and request id are lifted into metadata when the SDK supplied them.
 *
 * @public
 */
export class RemoteError extends BaseError {
  /**
   * Create a new remote error
   *
   * @param message - User-friendly error message
   * @param service - AWS service that failed (EC2, EC2InstanceConnect, SSM, credentials)
   * @param operation - API operation that failed
   * @param cause - Original error from the SDK
   * @param metadata - Additional API context
   */
  constructor(
    message: string,
    service?: string,
    operation?: string,
    cause?: unknown,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "REMOTE_ERROR", {
      service,
      operation,
      cause,
      ...extractSdkMetadata(cause),
      ...metadata,
    });
  }
}

/**
 * Pull the response metadata out of an AWS SDK v3 service exception
 *
 * @param cause - Error thrown by `client.send`
 * @returns HTTP status and request id when present
 * @internal
 */
function extractSdkMetadata(cause: unknown): Record<string, unknown> {
  if (!(cause instanceof Error) || !("$metadata" in cause)) {
    return {};
  }

  const responseMetadata = cause.$metadata;
  if (typeof responseMetadata !== "object" || responseMetadata === null) {
    return {};
  }

  const extracted: Record<string, unknown> = {};
  if ("httpStatusCode" in responseMetadata) {
    extracted.httpStatusCode = responseMetadata.httpStatusCode;
  }
  if ("requestId" in responseMetadata) {
    extracted.requestId = responseMetadata.requestId;
  }
  return extracted;
}

/**
 * Describe an unknown thrown value as a message string
 *
 * @param error - Anything caught in a catch clause
 * @returns The error message, or the stringified value
 *
 * @public
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check if an error is one of our custom error types
 *
 * @param error - The error to check
 * @returns True if the error is a BaseError instance
 *
 * @public
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Format error for user display with appropriate detail level
 *
 * @param error - The error to format
 * @param includeMetadata - Whether to include error metadata in output
 * @returns Formatted error message for user display
 *
 * @public
 */
export function formatError(error: unknown, includeMetadata = false): string {
  if (isBaseError(error)) {
    let formatted = `${error.code}: ${error.message}`;

    if (includeMetadata && Object.keys(error.metadata).length > 0) {
      const sanitizedMetadata = sanitizeErrorForVerboseOutput(error.metadata);
      formatted += `\nDetails: ${JSON.stringify(sanitizedMetadata, undefined, 2)}`;
    }

    return formatted;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Format error for user display with resolution guidance
 *
 * @param error - The error to format
 * @param includeMetadata - Whether to include error metadata in output
 * @returns Formatted error message followed by resolution steps, when known
 *
 * @public
 */
export function formatErrorWithGuidance(error: unknown, includeMetadata = false): string {
  const basicMessage = formatError(error, includeMetadata);
  const guidance = getErrorGuidance(error);

  if (guidance) {
    return `${basicMessage}\n\n${guidance}`;
  }

  return basicMessage;
}
