// SPDX-License-Identifier: Apache-2.0

export class DeployNetError extends Error {
  public readonly statusCode?: number;

  /**
   * Create a custom error object
   *
   * error metadata will include the `cause`
   *
   * @param message error message
   * @param cause source error (if any)
   * @param meta additional metadata (if any)
   */
  public constructor(
    message: string,
    cause?: unknown,
    public readonly meta: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = DeployNetError.statusCodeOf(cause);
    Error.captureStackTrace(this, this.constructor);
    if (cause !== undefined && cause !== null) {
      this.cause = cause;
      if (cause instanceof Error) {
        this.stack += `\nCaused by: ${cause.stack}`;
      }
    }
  }

  /** Reads a numeric `statusCode` from API and runtime errors that carry one */
  public static statusCodeOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'statusCode' in error) {
      const statusCode: unknown = error.statusCode;
      return typeof statusCode === 'number' ? statusCode : undefined;
    }
    return undefined;
  }

  /** Returns the message of any thrown value */
  public static messageOf(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }
}
