/**
 * @module proxy
 * SSH ProxyCommand through EC2 Instance Connect and Session Manager
 *
 * Resolves the host token ssh passes in, authorizes the local public key on
 * the instance, starts an SSH session and hands the connection to
 * session-manager-plugin.
 */

import { Args, Flags } from "@oclif/core";
import { buildProxyParameters } from "../lib/proxy-config.js";
import { PROXY_DEFAULTS, ProxyInputSchema, type ProxyInput } from "../lib/proxy-schemas.js";
import { EC2Service } from "../services/ec2-service.js";
import { InstanceConnectService } from "../services/instance-connect-service.js";
import { ProxyService } from "../services/proxy-service.js";
import { SessionManagerPlugin } from "../services/ssm/session-manager-plugin.js";
import { SSMService } from "../services/ssm/ssm-service.js";
import { BaseCommand } from "./base-command.js";

/**
 * Proxy command
 *
 * @public
 */
export default class ProxyCommand extends BaseCommand {
  static override readonly description =
    "Connect ssh to an EC2 instance through EC2 Instance Connect and Session Manager";

  static override readonly examples = [
    {
      description: "Use as a ProxyCommand in ~/.ssh/config",
      command: "Host ec2.*\n  ProxyCommand <%= config.bin %> %h %p",
    },
    {
      description: "Select the AWS profile from the host name",
      command: "<%= config.bin %> ec2.staging.web-1 22 --pattern 'ec2\\.{profile}\\.{name}'",
    },
    {
      description: "Address an instance by id as a different OS user",
      command: "<%= config.bin %> i-0123456789abcdef0 22 --pattern '{id}' --user ubuntu",
    },
  ];

  static override readonly args = {
    host: Args.string({
      description: "Host name as passed by ssh (%h)",
      required: true,
    }),
    port: Args.integer({
      description: "Remote port as passed by ssh (%p)",
      required: true,
    }),
  };

  static override readonly flags = {
    ...BaseCommand.commonFlags,

    pattern: Flags.string({
      description: "Host name pattern with {name}, {id} and {profile} placeholders",
      default: PROXY_DEFAULTS.pattern,
      helpValue: "PATTERN",
    }),

    "public-key": Flags.string({
      description: "SSH public key to authorize on the instance",
      default: PROXY_DEFAULTS.publicKeyPath,
      helpValue: "PATH",
    }),

    user: Flags.string({
      char: "u",
      description: "OS user the public key is authorized for",
      default: PROXY_DEFAULTS.user,
      helpValue: "USERNAME",
    }),
  };

  /**
   * Execute the proxy command
   *
   * @returns Promise resolving when the session transport exits
   */
  async run(): Promise<void> {
    let verbose = false;

    try {
      const { args, flags } = await this.parse(ProxyCommand);
      verbose = flags.verbose;

      const input: ProxyInput = ProxyInputSchema.parse({
        host: args.host,
        port: args.port,
        pattern: flags.pattern,
        profile: flags.profile,
        region: flags.region,
        publicKeyPath: flags["public-key"],
        user: flags.user,
        verbose: flags.verbose,
      });

      const parameters = await buildProxyParameters(input);
      const serviceConfig = this.getServiceConfig(input);

      const proxy = new ProxyService({
        ec2: new EC2Service(serviceConfig),
        instanceConnect: new InstanceConnectService(serviceConfig),
        ssm: new SSMService(serviceConfig),
        transport: new SessionManagerPlugin({ logger: serviceConfig.logger }),
        logger: serviceConfig.logger,
      });

      await proxy.run(parameters);
    } catch (error) {
      this.error(this.formatError(error, verbose), { exit: 1 });
    }
  }
}
