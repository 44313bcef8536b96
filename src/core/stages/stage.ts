// SPDX-License-Identifier: Apache-2.0

import {type NodeResult} from '../results/node-result.js';

/** A unit of a command's work; stages run after every stage they depend on */
export interface Stage<C> {
  readonly name: string;
  readonly dependsOn: readonly string[];

  /**
   * Runs the stage. Per-target failures are returned as results; a throw fails the stage as a whole and skips every
   * stage that depends on it.
   */
  run(context: C): Promise<NodeResult[]>;
}
