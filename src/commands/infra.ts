// SPDX-License-Identifier: Apache-2.0

import {BaseCommand} from './base.js';
import {NetworkStages} from './network-stages.js';
import {Flags as flags} from './flags.js';
import {type ArgvStruct, type Yargs} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';

export const CLOUD_FLAGS = [flags.provider, flags.project, flags.zone, flags.credentials];

export const DESIRED_STATE_FLAGS = [
  flags.networkConfigDirectory,
  flags.validatorsDirectory,
  flags.bootNodesDirectory,
  flags.stateFile,
];

export class InfraCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'infra';

  public static readonly FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [
      ...CLOUD_FLAGS,
      ...DESIRED_STATE_FLAGS,
      flags.resourcePrefix,
      flags.concurrency,
      flags.sshUser,
      flags.sshKey,
      flags.quiet,
    ],
  };

  public getCommandDefinition(): CommandDefinition {
    return {
      command: InfraCommand.COMMAND_NAME,
      describe: 'Provision instances, data disks, firewall rules and the ssh key of every node',
      builder: (y: Yargs): Yargs => {
        flags.setRequiredCommandFlags(y, ...InfraCommand.FLAGS_LIST.required);
        return flags.setOptionalCommandFlags(y, ...InfraCommand.FLAGS_LIST.optional);
      },
      handler: async (argv: ArgvStruct): Promise<void> => {
        this.logger.info("==== Running 'infra' ===", {argv});
        await this.provision(argv);
        this.logger.info("==== Finished running 'infra' ===");
      },
    };
  }

  private async provision(argv: ArgvStruct): Promise<void> {
    const stages = new NetworkStages(
      this.logger,
      this.configManager,
      this.stateStore(),
      () => this.createCloudProvider(),
      this.hostProviders,
      this.renderer,
    );

    await this.runStages(argv, 'infra', () => [stages.access(), stages.infra()]);
  }
}
