// SPDX-License-Identifier: Apache-2.0

import {Listr} from 'listr2';
import chalk from 'chalk';
import {BaseCommand} from './base.js';
import {CLOUD_FLAGS, DESIRED_STATE_FLAGS} from './infra.js';
import {Flags as flags} from './flags.js';
import {DeployedNode} from '../data/schema/model/state/deployed-node.js';
import {type DesiredState} from '../core/metadata/desired-state.js';
import {type Instance} from '../integration/cloud/resources/instance/instance.js';
import {type NodeResult, NodeResults} from '../core/results/node-result.js';
import {DeployNetError} from '../core/errors/deploy-net-error.js';
import * as constants from '../core/constants.js';
import {type ArgvStruct, type Yargs} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';
import {type CommandFlags} from '../types/flag-types.js';

export const SYNC_STAGE = 'sync';

interface StateSyncContext {
  desired?: DesiredState;
  instances: Instance[];
  results: NodeResult[];
}

export class StateCommand extends BaseCommand {
  public static readonly COMMAND_NAME = 'state';

  public static readonly SHOW_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [flags.stateFile],
  };

  public static readonly SYNC_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [...CLOUD_FLAGS, ...DESIRED_STATE_FLAGS, flags.quiet],
  };

  public static readonly RESET_FLAGS_LIST: CommandFlags = {
    required: [],
    optional: [flags.stateFile],
  };

  public getCommandDefinition(): CommandDefinition {
    return {
      command: StateCommand.COMMAND_NAME,
      describe: 'Inspect and manage the deployed state cache',
      builder: (yargs: Yargs): Yargs =>
        yargs
          .command({
            command: 'show',
            describe: 'Print the cached deployed state',
            builder: (y: Yargs): Yargs => {
              flags.setRequiredCommandFlags(y, ...StateCommand.SHOW_FLAGS_LIST.required);
              return flags.setOptionalCommandFlags(y, ...StateCommand.SHOW_FLAGS_LIST.optional);
            },
            handler: async (argv: ArgvStruct): Promise<void> => {
              this.logger.info("==== Running 'state show' ===", {argv});
              await this.show();
              this.logger.info("==== Finished running 'state show' ===");
            },
          })
          .command({
            command: 'sync',
            describe: 'Rebuild the cache from the live instances managed by deploynet',
            builder: (y: Yargs): Yargs => {
              flags.setRequiredCommandFlags(y, ...StateCommand.SYNC_FLAGS_LIST.required);
              return flags.setOptionalCommandFlags(y, ...StateCommand.SYNC_FLAGS_LIST.optional);
            },
            handler: async (argv: ArgvStruct): Promise<void> => {
              this.logger.info("==== Running 'state sync' ===", {argv});
              await this.sync(argv);
              this.logger.info("==== Finished running 'state sync' ===");
            },
          })
          .command({
            command: 'reset',
            describe: 'Delete the cached deployed state',
            builder: (y: Yargs): Yargs => {
              flags.setRequiredCommandFlags(y, ...StateCommand.RESET_FLAGS_LIST.required);
              return flags.setOptionalCommandFlags(y, ...StateCommand.RESET_FLAGS_LIST.optional);
            },
            handler: async (argv: ArgvStruct): Promise<void> => {
              this.logger.info("==== Running 'state reset' ===", {argv});
              await this.reset();
              this.logger.info("==== Finished running 'state reset' ===");
            },
          })
          .demandCommand(1, 'Select a state command'),
    };
  }

  private async show(): Promise<void> {
    const store = this.stateStore();
    const state = await store.load();
    this.logger.showJSON(`Deployed state (${store.key})`, this.mapper.toObject(state));
  }

  private async reset(): Promise<void> {
    const store = this.stateStore();
    const removed = await store.reset();
    this.logger.showUser(
      removed ? chalk.green(`Deleted ${store.key}`) : chalk.yellow(`No deployed state found at ${store.key}`),
    );
  }

  private async sync(argv: ArgvStruct): Promise<void> {
    const tasks = new Listr<StateSyncContext>(
      [
        {
          title: 'Load desired state',
          task: async (context_): Promise<void> => {
            this.configManager.update(argv);
            context_.desired = await this.desiredStateLoader.load(this.desiredStateSources());
          },
        },
        {
          title: 'List managed instances',
          task: async (context_, task): Promise<void> => {
            const cloud = this.createCloudProvider();
            context_.instances = await cloud.instances().list({[constants.MANAGED_LABEL]: 'true'});
            task.title += `: ${context_.instances.length} found in ${cloud.project}/${cloud.zone}`;
          },
        },
        {
          title: 'Write deployed state',
          task: async (context_): Promise<void> => {
            const desired = StateCommand.requireDesired(context_);
            const store = this.stateStore();
            const nodes = this.joinInstances(desired, context_.instances);
            await store.replaceAll(nodes);
            const settings = this.cloudSettings();
            await store.setMetadata(settings.project, settings.zone);
            context_.results = nodes.map(node => NodeResults.ok(node.nodeName, SYNC_STAGE, `ip ${node.ip}`));
          },
        },
      ],
      this.listrOptions<StateSyncContext>(),
    );

    let context_: StateSyncContext;
    try {
      context_ = await tasks.run({instances: [], results: []});
    } catch (error) {
      throw new DeployNetError(`Error syncing deployed state: ${DeployNetError.messageOf(error)}`, error);
    }

    this.reporter.report('state sync', context_.results);
  }

  /**
   * Pairs every live instance with its desired node through the node label. Instances without a desired node or a
   * public IP are left out of the cache.
   */
  private joinInstances(desired: DesiredState, instances: readonly Instance[]): DeployedNode[] {
    const nodes: DeployedNode[] = [];
    for (const instance of instances) {
      const nodeName = instance.labels[constants.NODE_LABEL] ?? instance.name;
      const spec = desired.node(nodeName);
      if (!spec) {
        this.logger.warn(`Instance ${instance.name} is not part of the desired network, skipping`);
        continue;
      }
      if (!instance.publicIp) {
        this.logger.warn(`Instance ${instance.name} has no public IP, skipping`);
        continue;
      }
      nodes.push(new DeployedNode(spec.nodeName, spec.team, spec.address, spec.peerId, instance.publicIp));
    }
    return nodes;
  }
}
