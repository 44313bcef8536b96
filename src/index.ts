// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';
import 'dotenv/config';
import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import {TaskOutput} from './core/logging/task-output.js';
import {type NetLogger} from './core/logging/net-logger.js';
import {Container} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type Middlewares} from './core/middlewares.js';
import {DeployNetError} from './core/errors/deploy-net-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {getDeployNetVersion} from '../version.js';

export interface MainContext {
  logger?: NetLogger;
}

export async function main(argv: string[], context?: MainContext): Promise<void> {
  try {
    Container.getInstance().init();
  } catch (error) {
    console.error(`Error initializing container: ${DeployNetError.messageOf(error)}`, error);
    throw new DeployNetError('Error initializing container', error);
  }

  const logger = container.resolve<NetLogger>(InjectTokens.NetLogger);

  if (context) {
    // save the logger so that deploynet.ts can use it to properly flush the logs and exit
    context.logger = logger;
  }
  process.on('unhandledRejection', reason => {
    logger.showUserError(new DeployNetError(`Unhandled Rejection, reason: ${DeployNetError.messageOf(reason)}`, reason));
  });
  process.on('uncaughtException', (error, origin) => {
    logger.showUserError(new DeployNetError(`Uncaught Exception: ${error.message}, origin: ${origin}`, error));
  });

  logger.debug('Initializing deploynet CLI');
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new TaskOutput(logger)});
  if (argv.length >= 3 && ['-version', '--version', '-v', '--v'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n******************************* deploynet ************************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(getDeployNetVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('')
    .usage('Usage:\n  deploynet <command> [options]')
    .alias('h', 'help')
    .command(commands.Initialize())
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [middlewares.setLoggerDevFlag(), middlewares.processArgumentsAndDisplayHeader()],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  rootCmd.fail((message, error) => {
    if (message) {
      if (message.includes('Unknown argument')) {
        logger.showUser(message);
        rootCmd.showHelp();
      } else {
        logger.showUserError(new DeployNetError(`Error running deploynet CLI, failure occurred: ${message}`));
      }
      rootCmd.exit(1, error);
      return;
    }

    // errors thrown by a command handler are reported by the entrypoint
    throw error;
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setCommandFlags(rootCmd, flags.devMode);
  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
