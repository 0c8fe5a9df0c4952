/**
 * @module ssm/ssm-errors
 * Session transport error types
 *
 * Extends the base error system with the failures of the
 * session-manager-plugin handoff. StartSession and TerminateSession API
 * failures are RemoteErrors.
 */

import { BaseError } from "../errors.js";

/**
 * Plugin not found error when session-manager-plugin is not on PATH
 *
 * @public
 */
export class PluginNotFoundError extends BaseError {
  /**
   * Create a new plugin not found error
   *
   * @param message - User-friendly error message
   * @param executable - Executable name that was looked up
   * @param cause - Spawn error, when the plugin vanished after the PATH check
   */
  constructor(message: string, executable: string, cause?: unknown) {
    super(message, "PLUGIN_NOT_FOUND", { executable, cause });
  }
}

/**
 * Transport error for a plugin process that failed
 *
 * Used when session-manager-plugin exits non-zero, is killed by a signal,
 * or cannot be spawned for a reason other than a missing executable.
 *
 * @public
 */
export class TransportError extends BaseError {
  /**
   * Create a new transport error
   *
   * @param message - User-friendly error message
   * @param sessionId - Session the plugin was serving
   * @param exitCode - Exit code of the plugin, when it exited
   * @param signal - Signal that terminated the plugin, when it was killed
   * @param cause - Error reported by the process runner
   */
  constructor(
    message: string,
    sessionId?: string,
    exitCode?: number,
    signal?: string,
    cause?: unknown,
  ) {
    super(message, "TRANSPORT_ERROR", {
      sessionId,
      exitCode,
      signal,
      cause,
    });
  }
}
