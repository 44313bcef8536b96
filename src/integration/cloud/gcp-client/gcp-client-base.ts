// SPDX-License-Identifier: Apache-2.0

import {DeployNetError} from '../../../core/errors/deploy-net-error.js';
import {CloudApiError} from '../errors/cloud-api-error.js';
import {CloudApiResponse} from '../cloud-api-response.js';
import {type GcpOperations} from './gcp-operations.js';

/**
 * Shared plumbing of the Compute Engine resource clients: error wrapping and not-found handling.
 */
export abstract class GcpClientBase {
  protected constructor(
    protected readonly project: string,
    protected readonly zone: string,
    protected readonly operations: GcpOperations,
  ) {}

  /**
   * Runs an API call, wrapping client library failures in a CloudApiError. Errors already raised by deploynet (an
   * operation that failed or timed out) pass through unchanged.
   */
  protected async call<T>(operation: string, resource: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (error instanceof DeployNetError) {
        throw error;
      }
      throw new CloudApiError(operation, resource, error);
    }
  }

  /**
   * Like `call`, but maps a not-found response to undefined.
   */
  protected async find<T>(operation: string, resource: string, request: () => Promise<T>): Promise<T | undefined> {
    try {
      return await request();
    } catch (error) {
      if (CloudApiResponse.isNotFound(error)) {
        return undefined;
      }
      throw new CloudApiError(operation, resource, error);
    }
  }

  protected diskUrl(diskName: string): string {
    return `projects/${this.project}/zones/${this.zone}/disks/${diskName}`;
  }
}
