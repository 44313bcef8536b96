// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type ConfigManager} from './config-manager.js';
import {type NetLogger} from './logging/net-logger.js';
import {type ArgvStruct} from '../types/aliases.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';

export type Middleware = (argv: ArgvStruct) => void;

@injectable()
export class Middlewares {
  public constructor(
    @inject(InjectTokens.ConfigManager) private readonly configManager: ConfigManager,
    @inject(InjectTokens.NetLogger) private readonly logger: NetLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.NetLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): Middleware {
    const logger = this.logger;

    /**
     * @param argv - yargs Argv
     */
    return (argv: ArgvStruct): void => {
      if (argv[flags.devMode.name] === true) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }
    };
  }

  /**
   * Processes the Argv and display the command header
   *
   * @returns callback function to be executed from yargs
   */
  public processArgumentsAndDisplayHeader(): Middleware {
    const configManager = this.configManager;
    const logger = this.logger;

    /**
     * @param argv - yargs Argv, updated in place with cached and default flag values
     */
    return (argv: ArgvStruct): void => {
      logger.debug('Processing arguments and displaying header');

      // stringify before precedence so that only user supplied flags are shown
      const commandArguments: string = flags.stringifyArgv(argv);

      // apply precedence for flags
      configManager.applyPrecedence(argv);

      // update config manager
      configManager.update(argv);

      // Build data to be displayed
      const currentCommand: string = argv._.join(' ');
      const commandData: string = `${currentCommand} ${commandArguments}`.trim();

      if (configManager.getBoolean(flags.quiet)) {
        return;
      }

      // Display command header
      logger.showUser(
        chalk.cyan('\n******************************* deploynet ************************************************'),
      );
      logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(configManager.getVersion()));
      logger.showUser(chalk.cyan('Cloud Provider\t\t:'), chalk.yellow(configManager.getString(flags.provider)));
      logger.showUser(chalk.cyan('Cloud Project\t\t:'), chalk.yellow(configManager.getString(flags.project) ?? '-'));
      logger.showUser(chalk.cyan('Cloud Zone\t\t:'), chalk.yellow(configManager.getString(flags.zone) ?? '-'));
      logger.showUser(chalk.cyan('Current Command\t\t:'), chalk.yellow(commandData));
      logger.showUser(chalk.cyan('**********************************************************************************'));
    };
  }
}
