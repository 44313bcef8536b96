// SPDX-License-Identifier: Apache-2.0

import {StatusCodes} from 'http-status-codes';

/** gRPC status code the client libraries report for a missing resource */
const GRPC_NOT_FOUND = 5;

export class CloudApiResponse {
  private constructor() {}

  /**
   * Checks whether an error thrown by a cloud client library means the resource does not exist.
   */
  public static isNotFound(error: unknown): boolean {
    if (typeof error !== 'object' || error === null) {
      return false;
    }

    const code: unknown = 'code' in error ? error.code : undefined;
    const statusCode: unknown = 'statusCode' in error ? error.statusCode : undefined;
    return code === StatusCodes.NOT_FOUND || code === GRPC_NOT_FOUND || statusCode === StatusCodes.NOT_FOUND;
  }
}
