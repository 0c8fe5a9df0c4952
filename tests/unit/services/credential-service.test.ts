/**
 * Unit tests for CredentialService
 *
 * Tests AWS SDK credential integration with mocked credential providers
 * and the client factory used by every AWS service.
 */

import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { RemoteError } from "../../../src/lib/errors.js";
import { LogLevel, Logger, type LogEntry } from "../../../src/lib/logger.js";
import { CredentialService } from "../../../src/services/credential-service.js";

vi.mock("@aws-sdk/credential-providers", () => ({
  fromNodeProviderChain: vi.fn(),
}));

const mockFromNodeProviderChain = vi.mocked(fromNodeProviderChain);

const TEST_CREDENTIALS = {
  accessKeyId: "test-access-key",
  secretAccessKey: "test-secret",
  sessionToken: "test-session-token",
};

/**
 * Records the configuration a client was constructed with
 */
class RecordingClient {
  constructor(readonly config: Record<string, unknown>) {}
}

describe("CredentialService", () => {
  let credentialProvider: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.clearAllMocks();
    credentialProvider = vi.fn().mockResolvedValue(TEST_CREDENTIALS);
    mockFromNodeProviderChain.mockReturnValue(credentialProvider);
  });

  describe("getCredentials", () => {
    it("should use the default provider chain without a profile", async () => {
      const service = new CredentialService();

      await expect(service.getCredentials()).resolves.toEqual(TEST_CREDENTIALS);
      expect(mockFromNodeProviderChain).toHaveBeenCalledWith();
    });

    it("should pass the profile to the provider chain", async () => {
      const service = new CredentialService();

      await service.getCredentials("staging");

      expect(mockFromNodeProviderChain).toHaveBeenCalledWith({ profile: "staging" });
    });

    it("should reuse the provider for the same profile", async () => {
      const service = new CredentialService();

      await service.getCredentials("staging");
      await service.getCredentials("staging");

      expect(mockFromNodeProviderChain).toHaveBeenCalledTimes(1);
      expect(credentialProvider).toHaveBeenCalledTimes(2);
    });

    it("should wrap resolution failures and drop the cached provider", async () => {
      const failure = Object.assign(new Error("Could not load credentials from any providers"), {
        name: "CredentialsProviderError",
      });
      credentialProvider.mockRejectedValueOnce(failure);
      const service = new CredentialService();

      const error = await service.getCredentials("staging").catch((error_: unknown) => error_);

      expect(error).toBeInstanceOf(RemoteError);
      expect(error).toMatchObject({
        message:
          "Failed to get credentials for profile 'staging': Could not load credentials from any providers",
        metadata: { service: "Credentials", operation: "resolve-credentials", profile: "staging", cause: failure },
      });

      await service.getCredentials("staging");
      expect(mockFromNodeProviderChain).toHaveBeenCalledTimes(2);
    });

    it("should log through the given logger when debug logging is enabled", async () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: LogLevel.DEBUG, output: (entry) => entries.push(entry) });
      const service = new CredentialService({ enableDebugLogging: true, logger });

      await service.getCredentials("staging");

      expect(entries.map((entry) => entry.message)).toEqual([
        "Created credential provider",
        "Retrieved credentials",
      ]);
    });
  });

  describe("createClient", () => {
    it("should pass only the configured fields to the client", async () => {
      const service = new CredentialService();

      const client = await service.createClient(RecordingClient, { profile: "staging" });

      expect(client.config).toEqual({ credentials: TEST_CREDENTIALS, profile: "staging" });
    });

    it("should pass region and endpoint overrides", async () => {
      const service = new CredentialService();

      const client = await service.createClient(RecordingClient, {
        region: "eu-west-1",
        endpoint: "http://localhost:4566",
      });

      expect(client.config).toEqual({
        credentials: TEST_CREDENTIALS,
        region: "eu-west-1",
        endpoint: "http://localhost:4566",
      });
    });
  });
});
