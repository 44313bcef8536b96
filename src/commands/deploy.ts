// SPDX-License-Identifier: Apache-2.0

import {BaseCommand} from './base.js';
import {NetworkStages} from './network-stages.js';
import {CLOUD_FLAGS, DESIRED_STATE_FLAGS} from './infra.js';
import {APP_FLAGS} from './app.js';
import {Flags as flags} from './flags.js';
import {ACCESS_STAGE, INFRA_STAGE} from '../core/infra/infrastructure-reconciler.js';
import {type ArgvStruct, type Yargs} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';

/** Runs infra then app in one invocation; the app stage starts once access and infra have finished */
export class DeployCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'deploy';

  public static readonly FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [
      ...CLOUD_FLAGS,
      ...DESIRED_STATE_FLAGS,
      ...APP_FLAGS,
      flags.resourcePrefix,
      flags.concurrency,
      flags.sshUser,
      flags.sshKey,
      flags.quiet,
    ],
  };

  public getCommandDefinition(): CommandDefinition {
    return {
      command: DeployCommand.COMMAND_NAME,
      describe: 'Provision the infrastructure and deploy every node',
      builder: (y: Yargs): Yargs => {
        flags.setRequiredCommandFlags(y, ...DeployCommand.FLAGS_LIST.required);
        return flags.setOptionalCommandFlags(y, ...DeployCommand.FLAGS_LIST.optional);
      },
      handler: async (argv: ArgvStruct): Promise<void> => {
        this.logger.info("==== Running 'deploy' ===", {argv});
        await this.deploy(argv);
        this.logger.info("==== Finished running 'deploy' ===");
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

    await this.runStages(argv, 'deploy', () => [
      stages.access(),
      stages.infra(),
      stages.app([ACCESS_STAGE, INFRA_STAGE]),
    ]);
  }
}
