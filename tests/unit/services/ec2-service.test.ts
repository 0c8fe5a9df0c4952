/**
 * Unit tests for EC2Service
 *
 * Tests instance lookup by Name tag and by instance id against a mocked
 * EC2 client.
 */

import { DescribeInstancesCommand, EC2Client, EC2ServiceException } from "@aws-sdk/client-ec2";
import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { InstanceNotFoundError } from "../../../src/lib/ec2-errors.js";
import { RemoteError } from "../../../src/lib/errors.js";
import { EC2Service } from "../../../src/services/ec2-service.js";

vi.mock("@aws-sdk/credential-providers", () => ({
  fromNodeProviderChain: vi.fn(),
}));

const ec2Mock = mockClient(EC2Client);
const config = { region: "us-east-1" };

describe("EC2Service", () => {
  let service: EC2Service;

  beforeEach(() => {
    vi.clearAllMocks();
    ec2Mock.reset();
    vi.mocked(fromNodeProviderChain).mockReturnValue(
      vi.fn().mockResolvedValue({ accessKeyId: "test-access-key", secretAccessKey: "test-secret" }),
    );

    service = new EC2Service();
  });

  describe("findInstance", () => {
    it("should filter by Name tag for a name target", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              {
                InstanceId: "i-0123456789abcdef0",
                Placement: { AvailabilityZone: "us-east-1a" },
              },
            ],
          },
        ],
      });

      const instance = await service.findInstance(config, { kind: "name", name: "web-1" });

      expect(instance).toEqual({
        instanceId: "i-0123456789abcdef0",
        availabilityZone: "us-east-1a",
      });
      const calls = ec2Mock.commandCalls(DescribeInstancesCommand);
      expect(calls).toHaveLength(1);
      expect(calls[0]?.args[0].input).toEqual({
        Filters: [{ Name: "tag:Name", Values: ["web-1"] }],
      });
    });

    it("should look up by instance id for an id target", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              { InstanceId: "i-0fedcba9876543210", Placement: { AvailabilityZone: "us-east-1c" } },
            ],
          },
        ],
      });

      await service.findInstance(config, { kind: "id", id: "i-0fedcba9876543210" });

      expect(ec2Mock.commandCalls(DescribeInstancesCommand)[0]?.args[0].input).toEqual({
        InstanceIds: ["i-0fedcba9876543210"],
      });
    });

    it("should take the first instance of the first reservation", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [
          {
            Instances: [
              { InstanceId: "i-0000000000000000a", Placement: { AvailabilityZone: "us-east-1a" } },
              { InstanceId: "i-0000000000000000b", Placement: { AvailabilityZone: "us-east-1b" } },
            ],
          },
          {
            Instances: [
              { InstanceId: "i-0000000000000000c", Placement: { AvailabilityZone: "us-east-1c" } },
            ],
          },
        ],
      });

      const instance = await service.findInstance(config, { kind: "name", name: "web" });

      expect(instance.instanceId).toBe("i-0000000000000000a");
    });

    it("should report no reservations as not found", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

      const error = await service
        .findInstance(config, { kind: "name", name: "web-1" })
        .catch((error_: unknown) => error_);

      expect(error).toBeInstanceOf(InstanceNotFoundError);
      expect(error).toMatchObject({
        message: "No instance with Name tag web-1 found",
        metadata: { filter: "tag:Name", name: "web-1" },
      });
    });

    it("should report an empty first reservation as not found", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [{ Instances: [] }] });

      await expect(
        service.findInstance(config, { kind: "id", id: "i-0123456789abcdef0" }),
      ).rejects.toThrow("Instance i-0123456789abcdef0 not found");
    });

    it("should wrap API failures in a remote error", async () => {
      const failure = new EC2ServiceException({
        name: "UnauthorizedOperation",
        $fault: "client",
        $metadata: { httpStatusCode: 403, requestId: "req-0001" },
        message: "You are not authorized to perform this operation.",
      });
      ec2Mock.on(DescribeInstancesCommand).rejects(failure);

      const error = await service
        .findInstance(config, { kind: "name", name: "web-1" })
        .catch((error_: unknown) => error_);

      expect(error).toBeInstanceOf(RemoteError);
      expect(error).toMatchObject({
        metadata: {
          service: "EC2",
          operation: "describe-instances",
          httpStatusCode: 403,
          requestId: "req-0001",
          cause: failure,
        },
      });
    });

    it("should reject an instance description without an availability zone", async () => {
      ec2Mock.on(DescribeInstancesCommand).resolves({
        Reservations: [{ Instances: [{ InstanceId: "i-0123456789abcdef0" }] }],
      });

      await expect(
        service.findInstance(config, { kind: "id", id: "i-0123456789abcdef0" }),
      ).rejects.toBeInstanceOf(RemoteError);
    });

    it("should not retry a failed request", async () => {
      ec2Mock.on(DescribeInstancesCommand).rejects(new Error("socket hang up"));

      await expect(
        service.findInstance(config, { kind: "name", name: "web-1" }),
      ).rejects.toBeInstanceOf(RemoteError);
      expect(ec2Mock.commandCalls(DescribeInstancesCommand)).toHaveLength(1);
    });
  });
});
