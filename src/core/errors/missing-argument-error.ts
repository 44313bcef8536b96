// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

export class MissingArgumentError extends DeployNetError {
  /**
   * Create a custom error for missing argument scenario
   *
   * @param message - error message
   * @param cause - source error (if any)
   */
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
