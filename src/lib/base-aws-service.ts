/**
 * @module base-aws-service
 * Base AWS service class providing common functionality for all AWS service implementations
 *
 * Provides shared functionality for AWS SDK client management, credential integration,
 * progress indicators, and debug logging. The EC2, EC2 Instance Connect and SSM
 * services extend this base class.
 *
 * @example Basic service implementation
 * ```typescript
 * export class MyService extends BaseAwsService<MyServiceClient> {
 *   constructor(options: BaseServiceOptions = {}) {
 *     super(MyServiceClient, "my-service", options);
 *   }
 *
 *   async myOperation(config: AwsClientConfig = {}): Promise<Result> {
 *     const spinner = this.createSpinner("Performing operation...");
 *     try {
 *       const client = await this.getClient(config);
 *       const result = await client.send(command);
 *       spinner.succeed("Operation completed");
 *       return result;
 *     } catch (error) {
 *       spinner.fail("Operation failed");
 *       throw error;
 *     }
 *   }
 * }
 * ```
 *
 * @public
 */

import ora from "ora";
import { CredentialService, type AwsClientConfig } from "../services/credential-service.js";
import { logger as rootLogger, type Logger } from "./logger.js";

/**
 * Spinner interface for progress indicators
 *
 * @public
 */
export interface SpinnerInterface {
  /** Current spinner text */
  text: string;
  /** Mark operation as successful */
  succeed: (message?: string) => void;
  /** Mark operation as failed */
  fail: (message?: string) => void;
  /** Mark operation with warning */
  warn: (message?: string) => void;
}

/**
 * Base configuration options for AWS services
 *
 * @public
 */
export interface BaseServiceOptions {
  /**
   * Enable debug logging for service operations
   */
  enableDebugLogging?: boolean;

  /**
   * Enable progress indicators for long-running operations
   *
   * @remarks
   * Off unless requested. Spinners render on stderr and never read stdin,
   * which belongs to the SSH transport.
   */
  enableProgressIndicators?: boolean;

  /**
   * Logger for debug output; a child of the default logger when absent
   */
  logger?: Logger;

  /**
   * AWS client configuration overrides
   */
  clientConfig?: {
    /** Custom endpoint URL */
    endpoint?: string;
  };
}

/**
 * Base AWS service class providing common functionality
 *
 * @typeParam TClient - AWS SDK client type
 *
 * @public
 */
export abstract class BaseAwsService<TClient> {
  /** Credential service for AWS authentication */
  protected readonly credentialService: CredentialService;

  /** Service configuration options */
  protected readonly options: BaseServiceOptions;

  /** Logger scoped to the concrete service */
  protected readonly logger: Logger;

  /** Cache for AWS SDK client instances */
  private clientCache = new Map<string, TClient>();

  /**
   * Create a new AWS service instance
   *
   * @param ClientConstructor - AWS SDK client constructor
   * @param component - Component name for log entries
   * @param options - Service configuration options
   *
   * @remarks
   * Client instances are cached per region/profile combination.
   */
  constructor(
    protected readonly ClientConstructor: new (config: Record<string, unknown>) => TClient,
    component: string,
    options: BaseServiceOptions = {},
  ) {
    this.options = {
      ...options,
      enableProgressIndicators: options.enableProgressIndicators ?? false,
    };
    this.logger = (options.logger ?? rootLogger).child({}, component);

    this.credentialService = new CredentialService({
      enableDebugLogging: options.enableDebugLogging ?? false,
      logger: this.logger,
    });
  }

  /**
   * Get or create an AWS SDK client instance
   *
   * @param config - Client configuration options
   * @returns Promise resolving to client instance
   *
   * @internal
   */
  protected async getClient(config: AwsClientConfig = {}): Promise<TClient> {
    const cacheKey = this.generateCacheKey(config);

    const cached = this.clientCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const client = await this.credentialService.createClient(this.ClientConstructor, {
      ...config,
      ...this.options.clientConfig,
    });
    this.clientCache.set(cacheKey, client);
    this.debug("Created AWS client", { cacheKey });

    return client;
  }

  /**
   * Create a progress spinner for long-running operations
   *
   * @param text - Initial spinner text
   * @returns Spinner interface for controlling progress display
   *
   * @remarks
   * If progress indicators are disabled, returns a spinner that implements
   * the same interface but does nothing.
   *
   * @internal
   */
  protected createSpinner(text: string): SpinnerInterface {
    return this.options.enableProgressIndicators
      ? ora({ text, stream: process.stderr, discardStdin: false }).start()
      : {
          text,
          succeed: () => {},
          fail: () => {},
          warn: () => {},
        };
  }

  /**
   * Write a debug entry when debug logging is enabled
   *
   * @internal
   */
  protected debug(message: string, context?: Record<string, unknown>): void {
    if (this.options.enableDebugLogging) {
      this.logger.debug(message, context);
    }
  }

  /**
   * Generate cache key for client instance
   *
   * @param config - Client configuration
   * @returns Sanitized cache key in the form `{region}::{profile}`
   *
   * @internal
   */
  private generateCacheKey(config: AwsClientConfig): string {
    const region = this.sanitizeIdentifier(config.region || "default");
    const profile = this.sanitizeIdentifier(config.profile || "default");
    return `${region}::${profile}`;
  }

  private sanitizeIdentifier(value: string): string {
    return value.replaceAll(/[^a-zA-Z0-9-_]/g, "_");
  }
}
