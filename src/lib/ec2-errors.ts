/**
 * EC2-specific error types for instance lookup
 *
 * Extends the base error system with the failure the instance locator
 * raises itself. API failures from DescribeInstances are RemoteErrors.
 *
 * @module ec2-errors
 */

import { BaseError } from "./errors.js";

/**
 * Instance not found error for lookups that matched nothing
 *
 * Used when DescribeInstances returns no reservations, or a first
 * reservation without instances.
 *
 * @public
 */
export class InstanceNotFoundError extends BaseError {
  /**
   * Create a new instance not found error
   *
   * @param message - User-friendly error message
   * @param filter - How the instance was looked up (tag name or instance id)
   * @param value - The name or id that was searched for
   * @param metadata - Additional lookup context
   */
  constructor(
    message: string,
    filter: "tag:Name" | "instance-id",
    value: string,
    metadata: Record<string, unknown> = {},
  ) {
    super(message, "INSTANCE_NOT_FOUND", {
      filter,
      ...(filter === "instance-id" ? { instanceId: value } : { name: value }),
      ...metadata,
    });
  }
}
