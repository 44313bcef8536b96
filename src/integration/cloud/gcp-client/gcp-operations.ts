// SPDX-License-Identifier: Apache-2.0

import {type GlobalOperationsClient, type ZoneOperationsClient, type protos} from '@google-cloud/compute';
import {type NetLogger} from '../../../core/logging/net-logger.js';
import {pollWithBackoff, RetryExhaustedError, type RetryPolicy, type Sleeper} from '../../../core/util/retry.js';
import {sleep} from '../../../core/helpers.js';
import {ProvisioningError} from '../../../core/errors/provisioning-error.js';
import {ProvisioningTimeoutError} from '../../../core/errors/provisioning-timeout-error.js';
import * as constants from '../../../core/constants.js';

type Operation = protos.google.cloud.compute.v1.IOperation;

const OPERATION_POLICY: RetryPolicy = {
  maxAttempts: constants.OPERATION_POLL_MAX_ATTEMPTS,
  baseDelayMs: 1000,
  maxDelayMs: 5000,
};

/**
 * Waits for Compute Engine long running operations. `wait` returns when the operation is done or after the server side
 * deadline, so each poll is a blocking call followed by a short backoff.
 */
export class GcpOperations {
  public constructor(
    private readonly project: string,
    private readonly zone: string,
    private readonly zoneOperations: ZoneOperationsClient,
    private readonly globalOperations: GlobalOperationsClient,
    private readonly logger: NetLogger,
    private readonly sleeper: Sleeper = sleep,
  ) {}

  /**
   * @param operation - the first element returned by a zonal mutation call
   * @param description - what the operation does, used in log lines and errors
   */
  public async waitZone(operation: unknown, description: string): Promise<void> {
    const name = GcpOperations.nameOf(operation);
    await this.waitFor(description, async () => {
      const [latest] = await this.zoneOperations.wait({project: this.project, zone: this.zone, operation: name});
      return latest;
    });
  }

  public async waitGlobal(operation: unknown, description: string): Promise<void> {
    const name = GcpOperations.nameOf(operation);
    await this.waitFor(description, async () => {
      const [latest] = await this.globalOperations.wait({project: this.project, operation: name});
      return latest;
    });
  }

  /**
   * Mutation calls return a long running operation wrapper whose `latestResponse` holds the compute Operation; some
   * paths hand back the compute Operation itself.
   */
  public static nameOf(operation: unknown): string {
    if (typeof operation === 'object' && operation !== null) {
      const latest: unknown = 'latestResponse' in operation ? operation.latestResponse : operation;
      if (typeof latest === 'object' && latest !== null && 'name' in latest && typeof latest.name === 'string') {
        return latest.name;
      }
    }
    throw new ProvisioningError('cloud API returned an operation without a name');
  }

  /** Formats the errors of a finished operation, or returns undefined when it succeeded */
  public static failureOf(operation: Operation): string | undefined {
    const errors = operation.error?.errors ?? [];
    if (errors.length === 0) {
      return undefined;
    }
    return errors.map(error => `${error.code ?? 'UNKNOWN'}: ${error.message ?? ''}`.trim()).join('; ');
  }

  private async waitFor(description: string, fetch: () => Promise<Operation>): Promise<void> {
    this.logger.debug(`Waiting for operation: ${description}`);
    try {
      await pollWithBackoff<undefined>(
        OPERATION_POLICY,
        async () => {
          const latest = await fetch();
          if (String(latest.status) !== 'DONE') {
            return {done: false, reason: `status ${String(latest.status)}`};
          }

          const failure = GcpOperations.failureOf(latest);
          if (failure) {
            throw new ProvisioningError(`operation failed: ${description}: ${failure}`);
          }
          return {done: true, value: undefined};
        },
        this.sleeper,
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new ProvisioningTimeoutError(description, error.attempts, error);
      }
      throw error;
    }
    this.logger.debug(`Operation done: ${description}`);
  }
}
