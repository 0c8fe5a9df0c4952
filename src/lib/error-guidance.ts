/**
 * @module error-guidance
 * User-friendly resolution guidance for proxy errors
 *
 * Provides step-by-step resolution guidance keyed by error code,
 * separated from error definitions to avoid circular imports.
 */

/**
 * Error-like interface for structural typing
 *
 * Allows guidance functions to work with any error object that has
 * the required code and metadata properties, avoiding circular imports.
 */
interface ErrorLike {
  code: string;
  metadata: Record<string, unknown>;
}

const PLUGIN_INSTALL_URL =
  "https://docs.aws.amazon.com/systems-manager/latest/userguide/session-manager-working-with-install-plugin.html";

/**
 * Narrow an unknown value to the structural error shape
 *
 * @internal
 */
function isErrorLike(error: unknown): error is ErrorLike {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string" &&
    "metadata" in error &&
    typeof error.metadata === "object" &&
    error.metadata !== null
  );
}

/**
 * Read a string metadata field
 *
 * @internal
 */
function metadataString(error: ErrorLike, key: string): string | undefined {
  const value = error.metadata[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Name of the AWS SDK exception wrapped by a remote error
 *
 * @internal
 */
function causeName(error: ErrorLike): string | undefined {
  const cause = error.metadata.cause;
  return cause instanceof Error ? cause.name : undefined;
}

/**
 * Get guidance for RemoteError
 *
 * @param error - The remote error
 * @returns Formatted guidance message
 * @internal
 */
function getRemoteErrorGuidance(error: ErrorLike): string {
  switch (causeName(error)) {
    case "TargetNotConnected": {
      return [
        "Instance is not connected to Session Manager:",
        "1. Verify SSM Agent is installed and running on the instance",
        "2. Check instance has IAM role with AmazonSSMManagedInstanceCore policy",
        "3. Ensure the instance can reach the SSM endpoints over HTTPS (port 443)",
      ].join("\n");
    }
    case "EC2InstanceNotFoundException":
    case "EC2InstanceStateInvalidException":
    case "EC2InstanceUnavailableException": {
      return [
        "EC2 Instance Connect could not reach the instance:",
        "1. Verify the instance is running",
        "2. Ensure ec2-instance-connect is installed on the instance",
        "3. Check the availability zone reported by describe-instances",
      ].join("\n");
    }
    case "InvalidArgsException": {
      return [
        "EC2 Instance Connect rejected the request:",
        "1. Check the public key is in OpenSSH format (ssh-rsa or ssh-ed25519)",
        "2. Verify the OS user exists on the instance (--user)",
      ].join("\n");
    }
    case "CredentialsProviderError": {
      return [
        "AWS credentials could not be resolved:",
        "1. Check the profile name passed with --profile or AWS_PROFILE",
        "2. Refresh SSO sessions with: aws sso login --profile PROFILE_NAME",
        "3. Verify ~/.aws/credentials and ~/.aws/config",
      ].join("\n");
    }
  }

  const service = metadataString(error, "service") ?? "AWS";
  const operation = metadataString(error, "operation");
  const operationInfo = operation ? ` (${operation})` : "";
  return [
    `${service} request failed${operationInfo}:`,
    "1. Check AWS credentials: aws sts get-caller-identity",
    "2. Verify IAM permissions for ec2:DescribeInstances, ec2-instance-connect:SendSSHPublicKey and ssm:StartSession",
    "3. Ensure you're using the correct AWS region (--region or AWS_REGION)",
  ].join("\n");
}

/**
 * Get user-friendly resolution guidance for proxy errors
 *
 * @param error - The error to get guidance for
 * @returns Resolution guidance message, or undefined when none applies
 *
 * @public
 */
export function getErrorGuidance(error: unknown): string | undefined {
  if (!isErrorLike(error)) {
    return undefined;
  }

  switch (error.code) {
    case "INVALID_PATTERN":
    case "AMBIGUOUS_HOST":
    case "UNRESOLVED_HOST": {
      const pattern = metadataString(error, "pattern") ?? "ec2.{name}";
      return [
        `Host name could not be resolved with pattern '${pattern}':`,
        "1. The pattern must contain exactly one of {name} or {id}, and may contain {profile}",
        "2. Each placeholder matches letters, digits, '_' and '-'; a repeated one keeps its last match",
        "3. Example: --pattern 'ec2.{profile}.{id}' matches ec2.prod.i-0123456789abcdef0",
      ].join("\n");
    }
    case "CONFIGURATION_ERROR": {
      return [
        "Local configuration is unusable:",
        "1. Check the public key path passed with --public-key (default ~/.ssh/id_rsa.pub)",
        "2. Generate a key with: ssh-keygen -t ed25519",
        "3. Ensure the file is readable by the current user",
      ].join("\n");
    }
    case "INSTANCE_NOT_FOUND": {
      return [
        "No matching EC2 instance:",
        "1. Verify the Name tag or instance ID is correct (case-sensitive)",
        "2. Ensure you're using the correct AWS region and profile",
        "3. List candidates with: aws ec2 describe-instances --filters Name=tag:Name,Values=NAME",
      ].join("\n");
    }
    case "PLUGIN_NOT_FOUND": {
      return [
        "session-manager-plugin is not installed:",
        "1. Install the plugin, then verify with: session-manager-plugin --version",
        "2. Ensure its directory is on PATH for the shell ssh runs ProxyCommand in",
        "",
        `Install plugin: ${PLUGIN_INSTALL_URL}`,
      ].join("\n");
    }
    case "TRANSPORT_ERROR": {
      return [
        "session-manager-plugin exited with an error:",
        "1. Run with --verbose to see the plugin's exit code",
        "2. Verify the SSM Agent on the instance supports AWS-StartSSHSession",
        "3. Update the plugin to the latest version",
      ].join("\n");
    }
    case "REMOTE_ERROR": {
      return getRemoteErrorGuidance(error);
    }
    default: {
      return undefined;
    }
  }
}
