// SPDX-License-Identifier: Apache-2.0

import {ProvisioningError} from './provisioning-error.js';

export class ProvisioningTimeoutError extends ProvisioningError {
  /**
   * @param operation - what was being waited for
   * @param attempts - how many attempts were made before giving up
   * @param cause - the last error seen while polling (if any)
   */
  public constructor(operation: string, attempts: number, cause?: unknown) {
    super(`timed out waiting for ${operation} after ${attempts} attempts`, cause, {operation, attempts});
  }
}
