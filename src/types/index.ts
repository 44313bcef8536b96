// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';

// NOTE: DO NOT add any deploynet imports in this file to avoid circular dependencies

export type CommandDefinition = CommandModule;

/**
 * Interface for capsuling validating for class's own properties
 */
export interface Validate {
  /**
   * Validates all properties of the class and throws if data is invalid
   */
  validate(): void;
}
