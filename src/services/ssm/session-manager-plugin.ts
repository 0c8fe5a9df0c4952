/**
 * @module ssm/session-manager-plugin
 * Session transport backed by the session-manager-plugin executable
 *
 * The plugin opens the session's WebSocket stream and copies it to and from
 * its own stdio. Run with inherited stdio it becomes the byte pipe between
 * ssh and the instance.
 */

import { ExecaError, execa } from "execa";
import which from "which";
import { describeError } from "../../lib/errors.js";
import { logger as rootLogger, type Logger } from "../../lib/logger.js";
import { withIgnoredSignals } from "../../lib/signals.js";
import { PluginNotFoundError, TransportError } from "../../lib/ssm/ssm-errors.js";
import type { SessionHandle } from "./ssm-service.js";

/**
 * Plugin executable looked up on PATH
 *
 * @public
 */
export const SESSION_MANAGER_PLUGIN = "session-manager-plugin";

/**
 * Operation name the plugin expects in third position
 */
const PLUGIN_OPERATION = "StartSession";

/**
 * Parameters for attaching the transport to a session
 *
 * @public
 */
export interface TransportStartParameters {
  handle: SessionHandle;
  /** Profile the session was started with, passed through to the plugin */
  profile?: string | undefined;
}

/**
 * Carries bytes between the local stdio and a started session
 *
 * @public
 */
export interface SessionTransport {
  /**
   * Verify the transport can run at all, before a session is started
   *
   * @throws \{PluginNotFoundError\} When the transport is unavailable
   */
  check(): Promise<void>;

  /**
   * Run the transport until the session ends
   *
   * @throws \{PluginNotFoundError\} When the transport vanished after the check
   * @throws \{TransportError\} When the transport fails or exits non-zero
   */
  start(parameters: TransportStartParameters): Promise<void>;
}

/**
 * Options for the plugin transport
 *
 * @public
 */
export interface SessionManagerPluginOptions {
  executable?: string;
  logger?: Logger;
}

/**
 * Positional arguments for the plugin
 *
 * @param handle - Started session
 * @param profile - AWS profile, empty when unset
 * @returns Arguments in the order the plugin reads them
 *
 * @public
 */
export function buildPluginArguments(handle: SessionHandle, profile?: string): string[] {
  return [
    JSON.stringify(handle.response),
    handle.region,
    PLUGIN_OPERATION,
    profile ?? "",
    JSON.stringify(handle.request),
    handle.endpoint,
  ];
}

/**
 * Session transport that runs session-manager-plugin as a child process
 *
 * @public
 */
export class SessionManagerPlugin implements SessionTransport {
  private readonly executable: string;
  private readonly logger: Logger;
  private resolvedPath: string | undefined;

  constructor(options: SessionManagerPluginOptions = {}) {
    this.executable = options.executable ?? SESSION_MANAGER_PLUGIN;
    this.logger = (options.logger ?? rootLogger).child({}, "session-manager-plugin");
  }

  async check(): Promise<void> {
    const resolved = await which(this.executable, { nothrow: true });
    if (resolved === null) {
      throw new PluginNotFoundError(
        `${this.executable} was not found on PATH`,
        this.executable,
      );
    }

    this.resolvedPath = resolved;
    this.logger.debug("Found session manager plugin", { executable: resolved });
  }

  async start(parameters: TransportStartParameters): Promise<void> {
    const { handle, profile } = parameters;
    const sessionId = handle.response.SessionId;
    const command = this.resolvedPath ?? this.executable;

    this.logger.debug("Handing session to plugin", {
      executable: command,
      sessionId,
      region: handle.region,
      endpoint: handle.endpoint,
    });

    await withIgnoredSignals(async () => {
      try {
        await execa(command, buildPluginArguments(handle, profile), { stdio: "inherit" });
      } catch (error) {
        throw this.toTransportFailure(error, sessionId);
      }
    });

    this.logger.debug("Plugin exited", { sessionId });
  }

  private toTransportFailure(error: unknown, sessionId: string): Error {
    if (!(error instanceof ExecaError)) {
      return new TransportError(
        `Session transport failed: ${describeError(error)}`,
        sessionId,
        undefined,
        undefined,
        error,
      );
    }

    if (error.code === "ENOENT") {
      return new PluginNotFoundError(
        `${this.executable} could not be executed`,
        this.executable,
        spawnCause(error),
      );
    }

    const reason = error.signal
      ? `was terminated by ${error.signal}`
      : `exited with code ${error.exitCode ?? "unknown"}`;

    return new TransportError(
      `${this.executable} ${reason}`,
      sessionId,
      error.exitCode,
      error.signal,
      spawnCause(error),
    );
  }
}

/**
 * Underlying spawn failure of an execa error
 *
 * Execa messages quote the full command line, and the first plugin
 * argument holds the session token, so only the original system error
 * message is kept.
 *
 * @internal
 */
function spawnCause(error: ExecaError): Error | undefined {
  return error.originalMessage ? new Error(error.originalMessage) : undefined;
}
