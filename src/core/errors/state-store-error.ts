// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

export class StateStoreError extends DeployNetError {
  public constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}
