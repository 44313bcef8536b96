// SPDX-License-Identifier: Apache-2.0

import {sleep} from '../helpers.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleeper = (millis: number) => Promise<void>;

/** Outcome of one poll: `done` carries the value, anything else asks for another attempt */
export type PollResult<T> = {done: true; value: T} | {done: false; reason?: string};

export class RetryExhaustedError extends Error {
  public constructor(
    public readonly attempts: number,
    public readonly lastReason?: string,
  ) {
    super(`gave up after ${attempts} attempts${lastReason ? `: ${lastReason}` : ''}`);
    this.name = this.constructor.name;
  }
}

/** Delay before the given (1 based) retry: base * 2^(attempt - 1), capped at maxDelayMs */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Polls until `attempt` reports done, sleeping with exponential backoff in between. Errors thrown by `attempt`
 * propagate immediately; only a not-done result is retried.
 */
export async function pollWithBackoff<T>(
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<PollResult<T>>,
  sleeper: Sleeper = sleep,
): Promise<T> {
  let lastReason: string | undefined;
  for (let attemptNumber = 1; attemptNumber <= policy.maxAttempts; attemptNumber++) {
    const result = await attempt(attemptNumber);
    if (result.done) {
      return result.value;
    }

    lastReason = result.reason;
    if (attemptNumber < policy.maxAttempts) {
      await sleeper(backoffDelay(policy, attemptNumber));
    }
  }

  throw new RetryExhaustedError(policy.maxAttempts, lastReason);
}
