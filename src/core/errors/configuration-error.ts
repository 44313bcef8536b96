// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

/**
 * Raised when a node's desired state cannot be used as given: a run config missing a required key, a metadata record
 * that fails validation, or a command template referencing an unknown placeholder.
 */
export class ConfigurationError extends DeployNetError {
  public constructor(message: string, cause?: unknown, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
