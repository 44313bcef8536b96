// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

export class DeploymentError extends DeployNetError {
  public constructor(message: string, cause?: unknown, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
