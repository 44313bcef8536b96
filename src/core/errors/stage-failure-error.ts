// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from './deploy-net-error.js';

/**
 * Thrown by a command after its outcome table has been printed when at least one node failed, so that the process
 * exits with a non-zero status.
 */
export class StageFailureError extends DeployNetError {
  public constructor(
    public readonly stage: string,
    public readonly failed: string[],
  ) {
    super(`${stage} failed for ${failed.length} target(s): ${failed.join(', ')}`, undefined, {stage, failed});
  }
}
