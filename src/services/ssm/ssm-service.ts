/**
 * @module ssm/ssm-service
 * SSM service for Session Manager SSH sessions
 *
 * Starts an `AWS-StartSSHSession` session for an instance port and
 * terminates sessions the transport never picked up. Reports the signing
 * region and endpoint the session-manager-plugin needs alongside the session
 * credentials.
 */

import {
  SSMClient,
  StartSessionCommand,
  TerminateSessionCommand,
} from "@aws-sdk/client-ssm";
import { BaseAwsService, type BaseServiceOptions } from "../../lib/base-aws-service.js";
import { BaseError, RemoteError, describeError } from "../../lib/errors.js";
import type { AwsClientConfig } from "../credential-service.js";

/**
 * Session document that forwards a port to the instance's SSH daemon
 *
 * @public
 */
export const SSH_SESSION_DOCUMENT = "AWS-StartSSHSession";

/**
 * Configuration options for SSM service
 *
 * @public
 */
export type SSMServiceOptions = BaseServiceOptions;

/**
 * Parameters for starting an SSH session
 *
 * @public
 */
export interface StartSshSessionParameters {
  instanceId: string;
  port: number;
}

/**
 * StartSession request as handed to the plugin
 *
 * @public
 */
export interface SessionRequest {
  readonly Target: string;
  readonly DocumentName: string;
  readonly Parameters: Record<string, string[]>;
}

/**
 * StartSession response fields the plugin needs
 *
 * @public
 */
export interface SessionResponse {
  readonly SessionId: string;
  readonly StreamUrl: string;
  readonly TokenValue: string;
}

/**
 * Everything the transport needs to attach to a started session
 *
 * @public
 */
export interface SessionHandle {
  readonly request: SessionRequest;
  readonly response: SessionResponse;
  /** Signing region of the SSM client */
  readonly region: string;
  /** SSM endpoint URL */
  readonly endpoint: string;
}

/**
 * SSM service for Session Manager SSH sessions
 *
 * @public
 */
export class SSMService extends BaseAwsService<SSMClient> {
  /**
   * Create a new SSM service instance
   *
   * @param options - Configuration options for the service
   */
  constructor(options: SSMServiceOptions = {}) {
    super(SSMClient, "ssm", options);
  }

  /**
   * Start an SSH session on an instance port
   *
   * @param config - AWS client configuration
   * @param parameters - Instance and remote port
   * @returns Session handle for the transport
   * @throws \{RemoteError\} When the session cannot be started or the response is incomplete
   */
  async startSshSession(
    config: AwsClientConfig,
    parameters: StartSshSessionParameters,
  ): Promise<SessionHandle> {
    const { instanceId, port } = parameters;
    const spinner = this.createSpinner(`Starting SSH session on ${instanceId}:${port}...`);

    const request: SessionRequest = {
      Target: instanceId,
      DocumentName: SSH_SESSION_DOCUMENT,
      Parameters: { portNumber: [String(port)] },
    };

    let client: SSMClient | undefined;
    let startedSessionId: string | undefined;

    try {
      client = await this.getClient(config);
      const response = await client.send(new StartSessionCommand(request));
      startedSessionId = response.SessionId;

      const { SessionId, StreamUrl, TokenValue } = response;
      if (!SessionId || !StreamUrl || !TokenValue) {
        throw new RemoteError(
          `SSM returned an incomplete session for ${instanceId}`,
          "SSM",
          "start-session",
          undefined,
          {
            instanceId,
            sessionId: SessionId,
            documentName: SSH_SESSION_DOCUMENT,
          },
        );
      }

      const { region, endpoint } = await this.resolveSessionEndpoint(client);

      spinner.succeed(`Session started: ${SessionId}`);
      this.debug("Started SSH session", { sessionId: SessionId, region, endpoint });

      return {
        request,
        response: { SessionId, StreamUrl, TokenValue },
        region,
        endpoint,
      };
    } catch (error) {
      spinner.fail("Failed to start session");
      // A session that was created but cannot be handed off is closed here
      if (client && startedSessionId) {
        await this.releaseSession(client, startedSessionId);
      }
      if (error instanceof BaseError) {
        throw error;
      }
      throw new RemoteError(
        `Failed to start SSM session on ${instanceId}: ${describeError(error)}`,
        "SSM",
        "start-session",
        error,
        { instanceId, documentName: SSH_SESSION_DOCUMENT },
      );
    }
  }

  /**
   * Terminate a session
   *
   * @param config - AWS client configuration
   * @param sessionId - ID of the session to terminate
   * @throws \{RemoteError\} When the request fails
   */
  async terminateSession(config: AwsClientConfig, sessionId: string): Promise<void> {
    const spinner = this.createSpinner(`Terminating session ${sessionId}...`);

    try {
      const client = await this.getClient(config);
      await client.send(new TerminateSessionCommand({ SessionId: sessionId }));

      spinner.succeed("Session terminated successfully");
      this.debug("Terminated session", { sessionId });
    } catch (error) {
      spinner.fail("Failed to terminate session");
      if (error instanceof BaseError) {
        throw error;
      }
      throw new RemoteError(
        `Failed to terminate SSM session ${sessionId}: ${describeError(error)}`,
        "SSM",
        "terminate-session",
        error,
        { sessionId },
      );
    }
  }

  /**
   * Terminate a session that was started but never returned
   *
   * Failures are logged; the start failure is what the caller sees.
   *
   * @internal
   */
  private async releaseSession(client: SSMClient, sessionId: string): Promise<void> {
    try {
      await client.send(new TerminateSessionCommand({ SessionId: sessionId }));
      this.debug("Terminated unusable session", { sessionId });
    } catch (error) {
      this.logger.warn(`Failed to terminate session ${sessionId}: ${describeError(error)}`, {
        sessionId,
      });
    }
  }

  /**
   * Signing region and endpoint URL of a client
   *
   * An endpoint override wins; otherwise the client's endpoint rules are
   * evaluated for its region with its FIPS and dual-stack settings.
   *
   * @internal
   */
  private async resolveSessionEndpoint(
    client: SSMClient,
  ): Promise<{ region: string; endpoint: string }> {
    const region = await client.config.region();

    const override = this.options.clientConfig?.endpoint;
    if (override) {
      return { region, endpoint: override };
    }

    const resolved = client.config.endpointProvider({
      Region: region,
      UseFIPS: await client.config.useFipsEndpoint(),
      UseDualStack: await client.config.useDualstackEndpoint(),
    });

    return { region, endpoint: resolved.url.href.replace(/\/$/, "") };
  }
}
