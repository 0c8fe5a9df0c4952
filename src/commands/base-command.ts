/**
 * @module base-command
 * Base command class for standardized command patterns
 *
 * Provides error formatting, shared flags and service configuration for the
 * proxy command. Commands never write to stdout: under ssh it carries the
 * forwarded connection, so everything user-facing goes to stderr.
 *
 * @example Basic command implementation
 * ```typescript
 * export default class MyCommand extends BaseCommand {
 *   static override readonly flags = {
 *     ...BaseCommand.commonFlags,
 *   };
 *
 *   async run(): Promise<void> {
 *     let verbose = false;
 *     try {
 *       const { flags } = await this.parse(MyCommand);
 *       verbose = flags.verbose;
 *       const service = new MyService(this.getServiceConfig(flags));
 *       await service.myOperation();
 *     } catch (error) {
 *       this.error(this.formatError(error, verbose), { exit: 1 });
 *     }
 *   }
 * }
 * ```
 *
 * @public
 */

import { Command, Flags } from "@oclif/core";
import { ZodError } from "zod";
import type { BaseServiceOptions } from "../lib/base-aws-service.js";
import { BaseError, describeError, formatErrorWithGuidance } from "../lib/errors.js";
import { LogLevel, Logger, logger as defaultLogger } from "../lib/logger.js";

/**
 * Base command class providing common functionality for all commands
 *
 * @public
 */
export abstract class BaseCommand extends Command {
  /**
   * Common flags shared across all commands
   */
  static readonly commonFlags = {
    region: Flags.string({
      char: "r",
      description: "AWS region (defaults to the profile's configured region)",
      helpValue: "REGION",
    }),

    profile: Flags.string({
      char: "p",
      description: "AWS profile to use for authentication",
      helpValue: "PROFILE_NAME",
    }),

    verbose: Flags.boolean({
      char: "v",
      description: "Enable verbose output with debug information on stderr",
      default: false,
    }),
  };

  /**
   * Format Zod validation errors
   *
   * @param error - ZodError instance
   * @param contextPrefix - Optional context prefix for the error message
   * @returns Formatted validation error message
   */
  private formatZodError(error: ZodError, contextPrefix: string): string {
    const issues = error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return `${contextPrefix}Validation failed - ${issues}`;
  }

  /**
   * Format BaseError and its subclasses
   *
   * @param error - BaseError instance
   * @param contextPrefix - Optional context prefix for the error message
   * @param verbose - Whether to include verbose details
   * @returns Formatted error message with guidance, and with sanitized
   * metadata, cause and stack trace in verbose mode
   */
  private formatBaseError(error: BaseError, contextPrefix: string, verbose: boolean): string {
    let message = `${contextPrefix}${formatErrorWithGuidance(error, verbose)}`;

    const cause = error.metadata.cause;
    if (verbose && cause !== undefined) {
      message += `\n\nCause: ${describeError(cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n\nStack trace:\n${error.stack}`;
    }

    return message;
  }

  /**
   * Format generic Error instances
   *
   * @param error - Error instance
   * @param contextPrefix - Optional context prefix for the error message
   * @param verbose - Whether to include verbose details
   * @returns Formatted error message with optional stack trace
   */
  private formatGenericError(error: Error, contextPrefix: string, verbose: boolean): string {
    let message = `${contextPrefix}${error.message}`;

    if (verbose && error.stack) {
      message += `\n\nStack trace:\n${error.stack}`;
    }

    return message;
  }

  /**
   * Format error with context and guidance
   *
   * @param error - Error to format
   * @param verbose - Whether to include verbose details
   * @param context - Operation context for error message
   * @returns Formatted error message
   */
  protected formatError(error: unknown, verbose = false, context?: string): string {
    const contextPrefix = context ? `${context}: ` : "";

    if (error instanceof ZodError) {
      return this.formatZodError(error, contextPrefix);
    }

    if (error instanceof BaseError) {
      return this.formatBaseError(error, contextPrefix, verbose);
    }

    if (error instanceof Error) {
      return this.formatGenericError(error, contextPrefix, verbose);
    }

    return `${contextPrefix}${String(error)}`;
  }

  /**
   * Get service configuration from flags
   *
   * @param flags - Command flags containing configuration
   * @returns Service configuration object
   *
   * @remarks
   * Verbose mode turns on debug logging at DEBUG level and progress
   * spinners, both on stderr.
   */
  protected getServiceConfig(flags: { verbose?: boolean }): BaseServiceOptions {
    const verbose = flags.verbose ?? false;

    return {
      enableDebugLogging: verbose,
      enableProgressIndicators: verbose,
      logger: verbose ? new Logger({ level: LogLevel.DEBUG, component: "ec2-ssh-proxy" }) : defaultLogger,
    };
  }
}
