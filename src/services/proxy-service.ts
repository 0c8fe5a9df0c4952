/**
 * Proxy run orchestration
 *
 * Drives one connection from located instance to running transport:
 * lookup, key push, plugin check, session start, handoff. Any failure ends
 * the run; a session whose transport turned out to be missing is
 * terminated before the error propagates.
 *
 * @module proxy-service
 */

import { describeError } from "../lib/errors.js";
import { logger as rootLogger, type Logger } from "../lib/logger.js";
import type { ProxyParameters } from "../lib/proxy-config.js";
import { PluginNotFoundError } from "../lib/ssm/ssm-errors.js";
import type { AwsClientConfig } from "./credential-service.js";
import type { EC2Service } from "./ec2-service.js";
import type { InstanceConnectService } from "./instance-connect-service.js";
import type { SessionTransport } from "./ssm/session-manager-plugin.js";
import type { SSMService } from "./ssm/ssm-service.js";

/**
 * Collaborators of a proxy run
 *
 * @public
 */
export interface ProxyServiceDependencies {
  ec2: Pick<EC2Service, "findInstance">;
  instanceConnect: Pick<InstanceConnectService, "sendPublicKey">;
  ssm: Pick<SSMService, "startSshSession" | "terminateSession">;
  transport: SessionTransport;
  logger?: Logger;
}

/**
 * Runs the proxy pipeline
 *
 * @public
 */
export class ProxyService {
  private readonly logger: Logger;

  constructor(private readonly dependencies: ProxyServiceDependencies) {
    this.logger = (dependencies.logger ?? rootLogger).child({}, "proxy");
  }

  /**
   * Connect the local stdio to the instance's SSH port
   *
   * Resolves when the transport exits cleanly.
   *
   * @param parameters - Assembled proxy parameters
   */
  async run(parameters: ProxyParameters): Promise<void> {
    const { ec2, instanceConnect, ssm, transport } = this.dependencies;
    const config: AwsClientConfig = {
      profile: parameters.profile,
      region: parameters.region,
    };

    const instance = await ec2.findInstance(config, parameters.target);
    this.logger.debug("Instance located", { ...instance });

    await instanceConnect.sendPublicKey(config, {
      instance,
      user: parameters.user,
      publicKey: parameters.publicKey,
    });

    await transport.check();

    const handle = await ssm.startSshSession(config, {
      instanceId: instance.instanceId,
      port: parameters.port,
    });

    try {
      await transport.start({ handle, profile: parameters.profile });
    } catch (error) {
      if (error instanceof PluginNotFoundError) {
        await this.terminateQuietly(config, handle.response.SessionId);
      }
      throw error;
    }
  }

  /**
   * Terminate an orphaned session, logging instead of throwing on failure
   *
   * @internal
   */
  private async terminateQuietly(config: AwsClientConfig, sessionId: string): Promise<void> {
    try {
      await this.dependencies.ssm.terminateSession(config, sessionId);
    } catch (terminateError) {
      this.logger.warn(
        `Failed to terminate session ${sessionId}: ${describeError(terminateError)}`,
        { sessionId },
      );
    }
  }
}
