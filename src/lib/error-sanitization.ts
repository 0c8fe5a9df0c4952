/**
 * Error sanitization utilities for secure verbose output
 *
 * @file
 * Verbose error output may be pasted into tickets, so only metadata on an
 * allowlist is printed and only when its value is a primitive. Session
 * tokens, stream URLs, credentials and public key material are never on the
 * list.
 */

/**
 * Sanitized error data safe for display
 *
 * @public
 */
export interface SanitizedError {
  readonly message?: string;
  readonly [key: string]: string | number | boolean | undefined;
}

/**
 * Set of metadata properties that are safe to include in verbose output
 *
 * @internal
 */
const SAFE_ERROR_PROPERTIES = new Set([
  "message",
  "stack",
  "name",
  "code",
  "requestId",
  "httpStatusCode",
  "errno",
  "syscall",
  "signal",
  "exitCode",
  "service",
  "operation",
  "configKey",
  "pattern",
  "hostname",
  "instanceId",
  "availabilityZone",
  "sessionId",
  "documentName",
  "executable",
]);

/**
 * Sanitize error objects or metadata records for verbose output display
 *
 * @param error - Error object or metadata record to sanitize
 * @returns Sanitized error data safe for logging
 *
 * @example
 * ```typescript
 * const sanitized = sanitizeErrorForVerboseOutput({
 *   sessionId: "session-0123",
 *   tokenValue: "test-token",
 * });
 * // Result: { sessionId: "session-0123" }
 * ```
 *
 * @public
 */
export function sanitizeErrorForVerboseOutput(error: unknown): SanitizedError {
  if (!(error instanceof Object)) {
    return { message: String(error) };
  }

  const sanitized: Record<string, string | number | boolean> = {};
  const record: Record<string, unknown> = { ...error };

  for (const [key, value] of Object.entries(record)) {
    if (SAFE_ERROR_PROPERTIES.has(key) && isSafePrimitive(value)) {
      sanitized[key] = value;
    }
  }

  // Error instances keep message and stack off the enumerable properties
  if (error instanceof Error) {
    sanitized.message = error.message;
    sanitized.name = error.name;
  }

  return sanitized;
}

/**
 * Check whether a value is a string, number, or boolean
 *
 * @internal
 */
function isSafePrimitive(value: unknown): value is string | number | boolean {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean";
}
