// SPDX-License-Identifier: Apache-2.0

import {ProvisioningError} from '../../../core/errors/provisioning-error.js';

export class CloudApiError extends ProvisioningError {
  /**
   * @param operation - the API call, e.g. `create instance`
   * @param resource - the name of the resource the call was made for
   * @param cause - the error returned by the client library
   */
  public constructor(
    public readonly operation: string,
    public readonly resource: string,
    cause?: unknown,
  ) {
    super(`failed to ${operation} '${resource}'`, cause, {operation, resource});
  }
}
