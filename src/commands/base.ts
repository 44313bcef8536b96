// SPDX-License-Identifier: Apache-2.0

import {inject} from 'tsyringe-neo';
import {Listr, type ListrBaseClassOptions} from 'listr2';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type NetLogger} from '../core/logging/net-logger.js';
import {type ConfigManager} from '../core/config-manager.js';
import {type DesiredStateLoader} from '../core/metadata/desired-state-loader.js';
import {type DesiredState, type DesiredStateSources} from '../core/metadata/desired-state.js';
import {type DeployedStateStoreFactory} from '../core/state/deployed-state-store-factory.js';
import {type DeployedStateStore} from '../core/state/deployed-state-store.js';
import {type CloudProviderFactory} from '../integration/cloud/cloud-provider-factory.js';
import {type CloudProvider, type CloudSettings} from '../integration/cloud/cloud-provider.js';
import {ProviderName} from '../integration/cloud/provider-name.js';
import {type HostFactoryProvider} from '../integration/host/host-factory-provider.js';
import {type ResultReporter} from '../core/results/result-reporter.js';
import {type NodeResult} from '../core/results/node-result.js';
import {type Stage} from '../core/stages/stage.js';
import {StageScheduler} from '../core/stages/stage-scheduler.js';
import {type TemplateRenderer} from '../core/templates/template-renderer.js';
import {type ObjectMapper} from '../data/mapper/api/object-mapper.js';
import {IllegalArgumentError} from '../core/errors/illegal-argument-error.js';
import {DeployNetError} from '../core/errors/deploy-net-error.js';
import {isValidEnum} from '../core/util/validation-helpers.js';
import {Flags as flags} from './flags.js';
import * as constants from '../core/constants.js';
import {type ArgvStruct} from '../types/aliases.js';
import {type CommandDefinition} from '../types/index.js';

export interface StageCommandContext {
  desired?: DesiredState;
  results: NodeResult[];
}

export type StageFactory = (desired: DesiredState) => Stage<DesiredState>[];

export abstract class BaseCommand {
  protected readonly logger: NetLogger;
  protected readonly configManager: ConfigManager;
  protected readonly desiredStateLoader: DesiredStateLoader;
  protected readonly stateStores: DeployedStateStoreFactory;
  protected readonly cloudProviders: CloudProviderFactory;
  protected readonly hostProviders: HostFactoryProvider;
  protected readonly reporter: ResultReporter;
  protected readonly renderer: TemplateRenderer;
  protected readonly mapper: ObjectMapper;

  public constructor(
    @inject(InjectTokens.NetLogger) logger?: NetLogger,
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.DesiredStateLoader) desiredStateLoader?: DesiredStateLoader,
    @inject(InjectTokens.DeployedStateStoreFactory) stateStores?: DeployedStateStoreFactory,
    @inject(InjectTokens.CloudProviderFactory) cloudProviders?: CloudProviderFactory,
    @inject(InjectTokens.HostFactoryProvider) hostProviders?: HostFactoryProvider,
    @inject(InjectTokens.ResultReporter) reporter?: ResultReporter,
    @inject(InjectTokens.TemplateRenderer) renderer?: TemplateRenderer,
    @inject(InjectTokens.ObjectMapper) mapper?: ObjectMapper,
  ) {
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.desiredStateLoader = patchInject(desiredStateLoader, InjectTokens.DesiredStateLoader, this.constructor.name);
    this.stateStores = patchInject(stateStores, InjectTokens.DeployedStateStoreFactory, this.constructor.name);
    this.cloudProviders = patchInject(cloudProviders, InjectTokens.CloudProviderFactory, this.constructor.name);
    this.hostProviders = patchInject(hostProviders, InjectTokens.HostFactoryProvider, this.constructor.name);
    this.reporter = patchInject(reporter, InjectTokens.ResultReporter, this.constructor.name);
    this.renderer = patchInject(renderer, InjectTokens.TemplateRenderer, this.constructor.name);
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
  }

  public abstract getCommandDefinition(): CommandDefinition;

  protected desiredStateSources(): DesiredStateSources {
    return {
      networkConfigDirectory: this.configManager.getRequiredString(flags.networkConfigDirectory),
      validatorsDirectory: this.configManager.getRequiredString(flags.validatorsDirectory),
      bootNodesDirectory: this.configManager.getRequiredString(flags.bootNodesDirectory),
    };
  }

  protected cloudSettings(): CloudSettings {
    const provider = this.configManager.getRequiredString(flags.provider);
    if (!isValidEnum(provider, ProviderName)) {
      throw new IllegalArgumentError(`unknown provider: ${provider}`, provider);
    }

    return {
      provider,
      project: this.configManager.getString(flags.project) ?? '',
      zone: this.configManager.getString(flags.zone) ?? '',
      credentials: this.configManager.getString(flags.credentials),
    };
  }

  protected createCloudProvider(): CloudProvider {
    return this.cloudProviders.create(this.cloudSettings());
  }

  protected stateStore(): DeployedStateStore {
    return this.stateStores.forFile(this.configManager.getRequiredString(flags.stateFile));
  }

  protected listrOptions<C>(): ListrBaseClassOptions<C> {
    const quiet = this.configManager.getBoolean(flags.quiet);
    return {
      concurrent: false,
      rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      silentRendererCondition: () => quiet,
    };
  }

  /**
   * Loads the desired state, runs the stages in dependency order and prints the outcome table.
   * @throws StageFailureError - when any target failed
   */
  protected async runStages(argv: ArgvStruct, title: string, stagesFor: StageFactory): Promise<NodeResult[]> {
    const tasks = new Listr<StageCommandContext>(
      [
        {
          title: 'Load desired state',
          task: async (context_, task): Promise<void> => {
            this.configManager.update(argv);
            context_.desired = await this.desiredStateLoader.load(this.desiredStateSources());
            task.title += `: ${context_.desired.nodes.length} node(s)`;
          },
        },
        {
          title: `Run ${title} stages`,
          task: async (context_, task): Promise<void> => {
            const desired = BaseCommand.requireDesired(context_);
            const scheduler = new StageScheduler<DesiredState>(stagesFor(desired));
            context_.results = await scheduler.run(desired, stage => {
              task.output = `running stage ${stage.name}`;
              this.logger.debug(`Running stage ${stage.name}`);
            });
          },
        },
      ],
      this.listrOptions<StageCommandContext>(),
    );

    let context_: StageCommandContext;
    try {
      context_ = await tasks.run({results: []});
    } catch (error) {
      throw new DeployNetError(`Error running ${title}: ${DeployNetError.messageOf(error)}`, error);
    }

    this.reporter.report(title, context_.results);
    return context_.results;
  }

  protected static requireDesired(context_: StageCommandContext): DesiredState {
    if (!context_.desired) {
      throw new DeployNetError('desired state was not loaded');
    }
    return context_.desired;
  }
}
