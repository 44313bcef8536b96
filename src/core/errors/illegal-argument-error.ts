// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

export class IllegalArgumentError extends DeployNetError {
  /**
   * Create a custom error for illegal argument scenario
   *
   * error metadata will include `value`
   *
   * @param message - error message
   * @param value - value of the invalid argument
   * @param cause - source error (if any)
   */
  public constructor(message: string, value: unknown = '', cause?: unknown) {
    super(message, cause, {value});
  }
}
