// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

export class UserBreak extends DeployNetError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
