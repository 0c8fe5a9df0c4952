/**
 * EC2 service for instance lookup
 *
 * Finds the instance an SSH host token refers to, by Name tag or by
 * instance id, and reports the id and availability zone the later Instance
 * Connect and Session Manager calls need.
 *
 * @module ec2-service
 */

import {
  DescribeInstancesCommand,
  EC2Client,
  type DescribeInstancesCommandInput,
  type Instance,
} from "@aws-sdk/client-ec2";
import { BaseAwsService, type BaseServiceOptions } from "../lib/base-aws-service.js";
import { InstanceNotFoundError } from "../lib/ec2-errors.js";
import { BaseError, RemoteError, describeError } from "../lib/errors.js";
import type { InstanceTarget } from "../lib/host-pattern.js";
import type { AwsClientConfig } from "./credential-service.js";

/**
 * Configuration options for EC2 service
 *
 * @public
 */
export type EC2ServiceOptions = BaseServiceOptions;

/**
 * Located instance
 *
 * @public
 */
export interface InstanceRef {
  readonly instanceId: string;
  readonly availabilityZone: string;
}

/**
 * EC2 service for instance lookup
 *
 * @public
 */
export class EC2Service extends BaseAwsService<EC2Client> {
  /**
   * Create a new EC2 service instance
   *
   * @param options - Configuration options for the service
   */
  constructor(options: EC2ServiceOptions = {}) {
    super(EC2Client, "ec2", options);
  }

  /**
   * Find the instance a host token refers to
   *
   * One DescribeInstances request, no pagination. The first instance of the
   * first reservation wins.
   *
   * @param config - AWS client configuration
   * @param target - Name tag value or instance id
   * @returns Instance id and availability zone
   * @throws \{InstanceNotFoundError\} When nothing matched
   * @throws \{RemoteError\} When the request fails or the description is incomplete
   */
  async findInstance(config: AwsClientConfig, target: InstanceTarget): Promise<InstanceRef> {
    const label = describeTarget(target);
    const spinner = this.createSpinner(`Looking up instance ${label}...`);

    let instance: Instance | undefined;
    try {
      const client = await this.getClient(config);
      const response = await client.send(new DescribeInstancesCommand(buildDescribeInput(target)));
      instance = response.Reservations?.[0]?.Instances?.[0];
    } catch (error) {
      spinner.fail("Failed to describe instances");
      if (error instanceof BaseError) {
        throw error;
      }
      throw new RemoteError(
        `Failed to describe EC2 instance ${label}: ${describeError(error)}`,
        "EC2",
        "describe-instances",
        error,
      );
    }

    if (!instance) {
      spinner.fail(`No instance matched ${label}`);
      throw target.kind === "id"
        ? new InstanceNotFoundError(`Instance ${target.id} not found`, "instance-id", target.id)
        : new InstanceNotFoundError(
            `No instance with Name tag ${target.name} found`,
            "tag:Name",
            target.name,
          );
    }

    const instanceId = instance.InstanceId;
    const availabilityZone = instance.Placement?.AvailabilityZone;
    if (!instanceId || !availabilityZone) {
      spinner.fail("Incomplete instance description");
      throw new RemoteError(
        `EC2 returned an instance description for ${label} without an id or availability zone`,
        "EC2",
        "describe-instances",
        undefined,
        { instanceId, availabilityZone },
      );
    }

    spinner.succeed(`Found instance ${instanceId} in ${availabilityZone}`);
    this.debug("Located instance", { instanceId, availabilityZone });

    return { instanceId, availabilityZone };
  }
}

/**
 * Request input for a target
 *
 * @internal
 */
function buildDescribeInput(target: InstanceTarget): DescribeInstancesCommandInput {
  return target.kind === "id"
    ? { InstanceIds: [target.id] }
    : { Filters: [{ Name: "tag:Name", Values: [target.name] }] };
}

function describeTarget(target: InstanceTarget): string {
  return target.kind === "id" ? target.id : `named ${target.name}`;
}
