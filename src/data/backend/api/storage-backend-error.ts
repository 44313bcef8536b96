// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from '../../../core/errors/deploy-net-error.js';

export class StorageBackendError extends DeployNetError {
  public constructor(message: string, cause?: unknown, meta?: Record<string, unknown>) {
    super(message, cause, meta);
  }
}
