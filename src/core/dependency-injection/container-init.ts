// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import {type NetLogger} from '../logging/net-logger.js';
import {NetWinstonLogger} from '../logging/net-winston-logger.js';
import * as constants from '../constants.js';
import {ConfigManager} from '../config-manager.js';
import {InjectTokens} from './inject-tokens.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {ClassToObjectMapper} from '../../data/mapper/impl/class-to-object-mapper.js';
import {DeployedStateSchema} from '../../data/schema/migration/impl/state/deployed-state-schema.js';
import {DeployedStateStoreFactory} from '../state/deployed-state-store-factory.js';
import {DesiredStateLoader} from '../metadata/desired-state-loader.js';
import {TemplateRenderer} from '../templates/template-renderer.js';
import {CloudProviderFactory} from '../../integration/cloud/cloud-provider-factory.js';
import {HostFactoryProvider} from '../../integration/host/host-factory-provider.js';
import {ResultReporter} from '../results/result-reporter.js';
import {PathEx} from '../util/path-ex.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param homeDirectory - the home directory to use, defaults to constants.DEPLOYNET_HOME_DIR
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    homeDirectory: string = constants.DEPLOYNET_HOME_DIR,
    logLevel: string = 'debug',
    developmentMode: boolean = false,
    testLogger?: NetLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<NetLogger>(InjectTokens.NetLogger).debug('Container already initialized');
      return;
    }

    container.register(InjectTokens.LogsDirectory, {useValue: PathEx.join(homeDirectory, 'logs')});

    // NetLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    if (testLogger) {
      container.registerInstance(InjectTokens.NetLogger, testLogger);
      container.resolve<NetLogger>(InjectTokens.NetLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.NetLogger, {useClass: NetWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<NetLogger>(InjectTokens.NetLogger).debug('Using default logger');
    }

    // Data Layer ObjectMapper
    container.register(InjectTokens.ObjectMapper, {useClass: ClassToObjectMapper}, {lifecycle: Lifecycle.Singleton});

    // Deployed state
    container.register(
      InjectTokens.DeployedStateSchema,
      {useClass: DeployedStateSchema},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.DeployedStateStoreFactory,
      {useClass: DeployedStateStoreFactory},
      {lifecycle: Lifecycle.Singleton},
    );

    // Desired state
    container.register(
      InjectTokens.DesiredStateLoader,
      {useClass: DesiredStateLoader},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.TemplateRenderer, {useClass: TemplateRenderer}, {lifecycle: Lifecycle.Singleton});

    // Cloud and host boundaries
    container.register(
      InjectTokens.CloudProviderFactory,
      {useClass: CloudProviderFactory},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(
      InjectTokens.HostFactoryProvider,
      {useClass: HostFactoryProvider},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.ConfigManager, {useClass: ConfigManager}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ResultReporter, {useClass: ResultReporter}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Middlewares, {useClass: Middlewares}, {lifecycle: Lifecycle.Singleton});

    container.resolve<NetLogger>(InjectTokens.NetLogger).debug('Container initialized');
    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   * @param homeDirectory - the home directory to use, defaults to constants.DEPLOYNET_HOME_DIR
   * @param logLevel - the log level to use, defaults to 'debug'
   * @param developmentMode - if true, show full stack traces in error messages
   * @param testLogger - a test logger to use, if provided
   */
  public reset(homeDirectory?: string, logLevel?: string, developmentMode?: boolean, testLogger?: NetLogger): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<NetLogger>(InjectTokens.NetLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(homeDirectory, logLevel, developmentMode, testLogger);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
