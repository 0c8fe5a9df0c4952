/**
 * EC2 Instance Connect service for temporary key authorization
 *
 * Pushes an SSH public key to an instance for one OS user. The instance
 * accepts the key for the next connection made within its short validity
 * window.
 *
 * @module instance-connect-service
 */

import {
  EC2InstanceConnectClient,
  SendSSHPublicKeyCommand,
} from "@aws-sdk/client-ec2-instance-connect";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import { BaseError, RemoteError, describeError } from "../lib/errors.js";
import type { AwsClientConfig } from "./credential-service.js";
import type { InstanceRef } from "./ec2-service.js";

/**
 * Configuration options for the Instance Connect service
 *
 * @public
 */
export type InstanceConnectServiceOptions = BaseServiceOptions;

/**
 * Parameters for sending a public key
 *
 * @public
 */
export interface SendPublicKeyParameters {
  instance: InstanceRef;
  user: string;
  publicKey: string;
}

/**
 * EC2 Instance Connect service
 *
 * @public
 */
export class InstanceConnectService extends BaseAwsService<EC2InstanceConnectClient> {
  constructor(options: InstanceConnectServiceOptions = {}) {
    super(EC2InstanceConnectClient, "instance-connect", options);
  }

  /**
   * Authorize a public key on an instance
   *
   * @param config - AWS client configuration
   * @param parameters - Target instance, OS user and key text
   * @throws \{RemoteError\} When the request fails or is not accepted
   */
  async sendPublicKey(config: AwsClientConfig, parameters: SendPublicKeyParameters): Promise<void> {
    const { instance, user, publicKey } = parameters;
    const spinner = this.createSpinner(`Sending SSH public key to ${instance.instanceId}...`);

    try {
      const client = await this.getClient(config);
      const response = await client.send(
        new SendSSHPublicKeyCommand({
          InstanceId: instance.instanceId,
          AvailabilityZone: instance.availabilityZone,
          InstanceOSUser: user,
          SSHPublicKey: publicKey,
        }),
      );

      if (response.Success === false) {
        throw new RemoteError(
          `EC2 Instance Connect did not accept the public key for ${user}@${instance.instanceId}`,
          "EC2InstanceConnect",
          "send-ssh-public-key",
          undefined,
          { instanceId: instance.instanceId, requestId: response.RequestId },
        );
      }

      spinner.succeed(`Public key authorized for ${user}`);
      this.debug("Sent SSH public key", {
        instanceId: instance.instanceId,
        requestId: response.RequestId,
      });
    } catch (error) {
      spinner.fail("Failed to send SSH public key");
      if (error instanceof BaseError) {
        throw error;
      }
      throw new RemoteError(
        `Failed to send SSH public key to ${instance.instanceId}: ${describeError(error)}`,
        "EC2InstanceConnect",
        "send-ssh-public-key",
        error,
        { instanceId: instance.instanceId, availabilityZone: instance.availabilityZone },
      );
    }
  }
}
