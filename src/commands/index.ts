// SPDX-License-Identifier: Apache-2.0

import {InfraCommand} from './infra.js';
import {AppCommand} from './app.js';
import {DeployCommand} from './deploy.js';
import {StateCommand} from './state.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
export function Initialize(): CommandDefinition[] {
  return [
    new InfraCommand().getCommandDefinition(),
    new AppCommand().getCommandDefinition(),
    new DeployCommand().getCommandDefinition(),
    new StateCommand().getCommandDefinition(),
  ];
}
