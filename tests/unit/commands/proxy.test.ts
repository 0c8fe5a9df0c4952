/**
 * Unit tests for the proxy command
 *
 * Tests argument handling, error reporting on stderr and the wiring of the
 * proxy pipeline, with ProxyService replaced so nothing reaches AWS.
 */

import { ExecaError } from "execa";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import ProxyCommand from "../../../src/commands/proxy.js";
import { RemoteError } from "../../../src/lib/errors.js";
import { PluginNotFoundError } from "../../../src/lib/ssm/ssm-errors.js";
import { EC2Service } from "../../../src/services/ec2-service.js";
import { InstanceConnectService } from "../../../src/services/instance-connect-service.js";
import { ProxyService } from "../../../src/services/proxy-service.js";
import { SessionManagerPlugin } from "../../../src/services/ssm/session-manager-plugin.js";
import { SSMService, type SessionHandle } from "../../../src/services/ssm/ssm-service.js";
import {
  createCliTestContext,
  runCommand,
  type CliTestContext,
} from "../../utils/cli-test-utilities.js";

const { runMock, execaMock } = vi.hoisted(() => ({
  runMock: vi.fn(),
  execaMock: vi.fn(),
}));

vi.mock("execa", async (importOriginal) => ({
  ...(await importOriginal<typeof import("execa")>()),
  execa: execaMock,
}));

vi.mock("../../../src/services/proxy-service.js", () => ({
  ProxyService: vi.fn(function () {
    return { run: runMock };
  }),
}));

const PUBLIC_KEY = "ssh-ed25519 AAAATestKey tester@example\n";

const handle: SessionHandle = {
  request: {
    Target: "i-0123456789abcdef0",
    DocumentName: "AWS-StartSSHSession",
    Parameters: { portNumber: ["22"] },
  },
  response: {
    SessionId: "tester-0123456789abcdef0",
    StreamUrl: "wss://ssmmessages.us-east-1.amazonaws.com/v1/data-channel/stream-secret",
    TokenValue: "test-token",
  },
  region: "us-east-1",
  endpoint: "https://ssm.us-east-1.amazonaws.com",
};

describe("ProxyCommand", () => {
  let context: CliTestContext;
  let keyDirectory: string;
  let keyPath: string;

  const run = (argv: string[]) =>
    runCommand((commandArgv, config) => new ProxyCommand(commandArgv, config), argv, context);

  beforeAll(async () => {
    context = await createCliTestContext();
    keyDirectory = await mkdtemp(path.join(tmpdir(), "ec2-ssh-proxy-"));
    keyPath = path.join(keyDirectory, "id_ed25519.pub");
    await writeFile(keyPath, PUBLIC_KEY);
  });

  afterAll(async () => {
    await rm(keyDirectory, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.clearAllMocks();
    runMock.mockResolvedValue(undefined);
  });

  describe("successful runs", () => {
    it("should run the proxy with parameters resolved from the host", async () => {
      const output = await run(["ec2.web-1", "22", "--public-key", keyPath]);

      expect(output.exitCode).toBe(0);
      expect(runMock).toHaveBeenCalledTimes(1);
      expect(runMock).toHaveBeenCalledWith({
        target: { kind: "name", name: "web-1" },
        user: "ec2-user",
        port: 22,
        publicKey: PUBLIC_KEY,
      });
    });

    it("should let the profile flag override the profile in the host", async () => {
      await run([
        "ec2.staging.i-0123456789abcdef0",
        "2222",
        "--pattern",
        String.raw`ec2\.{profile}\.{id}`,
        "--profile",
        "production",
        "--region",
        "eu-west-1",
        "--user",
        "ubuntu",
        "--public-key",
        keyPath,
      ]);

      expect(runMock).toHaveBeenCalledWith({
        target: { kind: "id", id: "i-0123456789abcdef0" },
        profile: "production",
        region: "eu-west-1",
        user: "ubuntu",
        port: 2222,
        publicKey: PUBLIC_KEY,
      });
    });

    it("should wire the AWS services and the plugin transport", async () => {
      await run(["ec2.web-1", "22", "--public-key", keyPath]);

      expect(ProxyService).toHaveBeenCalledWith(
        expect.objectContaining({
          ec2: expect.any(EC2Service),
          instanceConnect: expect.any(InstanceConnectService),
          ssm: expect.any(SSMService),
          transport: expect.any(SessionManagerPlugin),
        }),
      );
    });

    it("should hand a debug logger to the pipeline in verbose mode", async () => {
      await run(["ec2.web-1", "22", "--public-key", keyPath, "--verbose"]);

      const dependencies = vi.mocked(ProxyService).mock.calls[0]?.[0];
      const stderrWrite = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
      dependencies?.logger?.debug("verbose check");

      expect(stderrWrite).toHaveBeenCalledTimes(1);
      expect(String(stderrWrite.mock.calls[0]?.[0])).toContain("verbose check");
    });

    it("should never write to stdout", async () => {
      const output = await run(["ec2.web-1", "22", "--public-key", keyPath, "--verbose"]);

      expect(output.stdout).toBe("");
    });
  });

  describe("failures", () => {
    it("should reject a non-numeric port before doing any work", async () => {
      const output = await run(["ec2.web-1", "ssh", "--public-key", keyPath]);

      expect(output.exitCode).toBe(1);
      expect(ProxyService).not.toHaveBeenCalled();
    });

    it("should reject an out of range port", async () => {
      const output = await run(["ec2.web-1", "0", "--public-key", keyPath]);

      expect(output.exitCode).toBe(1);
      expect(output.error?.message).toBe("Validation failed - port: Port must be at least 1");
      expect(ProxyService).not.toHaveBeenCalled();
    });

    it("should report an unreadable public key with guidance", async () => {
      const missing = path.join(keyDirectory, "missing.pub");

      const output = await run(["ec2.web-1", "22", "--public-key", missing]);

      expect(output.exitCode).toBe(1);
      const lines = output.error?.message.split("\n") ?? [];
      expect(lines[0]).toMatch(
        `CONFIGURATION_ERROR: SSH public key file could not be read: ${missing} (`,
      );
      expect(lines[2]).toBe("Local configuration is unusable:");
      expect(ProxyService).not.toHaveBeenCalled();
    });

    it("should report a host the pattern does not resolve", async () => {
      const output = await run(["bastion", "22", "--public-key", keyPath]);

      expect(output.exitCode).toBe(1);
      expect(output.error?.message.split("\n")[0]).toBe(
        "UNRESOLVED_HOST: neither name nor id is specified",
      );
    });

    it("should report pipeline failures with guidance", async () => {
      runMock.mockRejectedValue(
        new PluginNotFoundError(
          "session-manager-plugin was not found on PATH",
          "session-manager-plugin",
        ),
      );

      const output = await run(["ec2.web-1", "22", "--public-key", keyPath]);

      expect(output.exitCode).toBe(1);
      expect(output.error?.message.split("\n").slice(0, 3)).toEqual([
        "PLUGIN_NOT_FOUND: session-manager-plugin was not found on PATH",
        "",
        "session-manager-plugin is not installed:",
      ]);
      expect(output.stdout).toBe("");
    });

    it("should keep session secrets out of verbose error details", async () => {
      runMock.mockRejectedValue(
        new RemoteError("Failed to start SSM session", "SSM", "start-session", undefined, {
          sessionId: "tester-0123456789abcdef0",
          tokenValue: "test-token",
        }),
      );

      const output = await run(["ec2.web-1", "22", "--public-key", keyPath, "--verbose"]);

      const message = output.error?.message ?? "";
      expect(message).toContain('"sessionId": "tester-0123456789abcdef0"');
      expect(message).not.toContain("test-token");
    });

    it("should keep the plugin command line out of verbose transport failures", async () => {
      execaMock.mockRejectedValue(
        Object.assign(
          new ExecaError(
            `Command failed with exit code 1: session-manager-plugin '${JSON.stringify(handle.response)}'`,
          ),
          { exitCode: 1 },
        ),
      );
      runMock.mockImplementation(() => new SessionManagerPlugin().start({ handle }));

      const output = await run(["ec2.web-1", "22", "--public-key", keyPath, "--verbose"]);

      const message = output.error?.message ?? "";
      expect(message.split("\n")[0]).toBe(
        "TRANSPORT_ERROR: session-manager-plugin exited with code 1",
      );
      expect(message).not.toContain("test-token");
      expect(message).not.toContain("stream-secret");
    });
  });
});
