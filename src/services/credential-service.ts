/**
 * AWS credential service for SDK integration
 *
 * Provides AWS SDK client factory methods with proper credential management
 * using the AWS credential provider chain. Profiles resolve the same way the
 * AWS CLI resolves them, so a profile named in the ssh host token or on the
 * command line selects both the credentials and the shared-config region.
 *
 */

import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { RemoteError, describeError } from "../lib/errors.js";
import { logger, type Logger } from "../lib/logger.js";

interface AwsCredentialIdentity {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

type CredentialProvider = () => Promise<AwsCredentialIdentity>;

interface ClientConfiguration {
  region?: string;
  profile?: string;
  credentials?: AwsCredentialIdentity;
  endpoint?: string;
  [key: string]: unknown;
}

/**
 * Configuration options for credential service
 *
 * @public
 */
export interface CredentialServiceOptions {
  /**
   * Enable debug logging for credential operations
   */
  enableDebugLogging?: boolean;

  /**
   * Logger for debug output
   */
  logger?: Logger;
}

/**
 * AWS client configuration for service operations
 *
 * @public
 */
export interface AwsClientConfig {
  /**
   * AWS region for the client; the profile's configured region when absent
   */
  region?: string | undefined;

  /**
   * AWS profile to use for credentials and region
   */
  profile?: string | undefined;

  /**
   * Custom endpoint URL for testing
   */
  endpoint?: string | undefined;
}

/**
 * AWS credential service for SDK integration
 *
 * @public
 */
export class CredentialService {
  private readonly enableDebugLogging: boolean;
  private readonly logger: Logger;
  private readonly credentialCache = new Map<string, CredentialProvider>();

  /**
   * Create a new credential service instance
   *
   * @param options - Configuration options for the service
   */
  constructor(options: CredentialServiceOptions = {}) {
    this.enableDebugLogging = options.enableDebugLogging ?? false;
    this.logger = options.logger ?? logger.child({}, "credentials");
  }

  /**
   * Get AWS credentials for a specific profile
   *
   * @param profile - AWS profile name; the default provider chain when absent
   * @returns Promise resolving to AWS credentials
   * @throws \{RemoteError\} When credential resolution fails
   */
  async getCredentials(profile?: string): Promise<AwsCredentialIdentity> {
    const cacheKey = `credentials-${profile ?? "default-chain"}`;

    try {
      let credentialProvider = this.credentialCache.get(cacheKey);

      if (!credentialProvider) {
        credentialProvider = profile ? fromNodeProviderChain({ profile }) : fromNodeProviderChain();
        this.credentialCache.set(cacheKey, credentialProvider);
        this.debug("Created credential provider", { profile: profile ?? "default chain" });
      }

      const credentials = await credentialProvider();
      this.debug("Retrieved credentials", { profile: profile ?? "default chain" });

      return credentials;
    } catch (error) {
      this.credentialCache.delete(cacheKey);

      throw new RemoteError(
        `Failed to get credentials for profile '${profile ?? "default"}': ${describeError(error)}`,
        "Credentials",
        "resolve-credentials",
        error,
        { profile },
      );
    }
  }

  /**
   * Create an AWS client with resolved credentials
   *
   * @param ClientClass - AWS SDK client class constructor
   * @param config - Client configuration options
   * @returns Promise resolving to configured AWS client
   * @throws \{RemoteError\} When credentials cannot be resolved
   *
   * @example
   * ```typescript
   * const credentialService = new CredentialService();
   * const ec2 = await credentialService.createClient(EC2Client, {
   *   profile: "staging",
   * });
   * ```
   */
  async createClient<T>(
    ClientClass: new (config: ClientConfiguration) => T,
    config: AwsClientConfig = {},
  ): Promise<T> {
    const credentials = await this.getCredentials(config.profile);

    const clientConfig: ClientConfiguration = {
      credentials,
      ...(config.region && { region: config.region }),
      ...(config.profile && { profile: config.profile }),
      ...(config.endpoint && { endpoint: config.endpoint }),
    };

    return new ClientClass(clientConfig);
  }

  private debug(message: string, context: Record<string, unknown>): void {
    if (this.enableDebugLogging) {
      this.logger.debug(message, context);
    }
  }
}
