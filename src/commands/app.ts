// SPDX-License-Identifier: Apache-2.0

import {BaseCommand} from './base.js';
import {NetworkStages} from './network-stages.js';
import {CLOUD_FLAGS, DESIRED_STATE_FLAGS} from './infra.js';
import {Flags as flags} from './flags.js';
import {type ArgvStruct, type Yargs} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';

export const APP_FLAGS = [flags.network, flags.peerAddressFormat];

export class AppCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'app';

  public static readonly FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [
      ...CLOUD_FLAGS,
      ...DESIRED_STATE_FLAGS,
      ...APP_FLAGS,
      flags.concurrency,
      flags.sshUser,
      flags.sshKey,
      flags.quiet,
    ],
  };

  public getCommandDefinition(): CommandDefinition {
    return {
      command: AppCommand.COMMAND_NAME,
      describe: 'Start or replace the container of every node on its provisioned host',
      builder: (y: Yargs): Yargs => {
        flags.setRequiredCommandFlags(y, ...AppCommand.FLAGS_LIST.required);
        return flags.setOptionalCommandFlags(y, ...AppCommand.FLAGS_LIST.optional);
      },
      handler: async (argv: ArgvStruct): Promise<void> => {
        this.logger.info("==== Running 'app' ===", {argv});
        await this.deploy(argv);
        this.logger.info("==== Finished running 'app' ===");
      },
    };
  }

  private async deploy(argv: ArgvStruct): Promise<void> {
    const stages = new NetworkStages(
      this.logger,
      this.configManager,
      this.stateStore(),
      () => this.createCloudProvider(),
      this.hostProviders,
      this.renderer,
    );

    await this.runStages(argv, 'app', () => [stages.app()]);
  }
}
