// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from './errors/illegal-argument-error.js';

export function sleep(millis: number): Promise<void> {
  return new Promise<void>(resolve => {
    setTimeout(resolve, millis);
  });
}

/** Joins list-valued variables the way node commands expect them */
export function toCsv(values: readonly string[]): string {
  return values.join(',');
}

/**
 * Runs `worker` over every item with at most `limit` in flight (0 = unbounded) and returns the settled outcomes in
 * input order. A rejection never stops the remaining items.
 */
export async function settleWithLimit<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new IllegalArgumentError('limit must be a non-negative integer', limit);
  }

  if (limit === 0 || limit >= items.length) {
    return Promise.allSettled(items.map(item => worker(item)));
  }

  const results: PromiseSettledResult<R>[] = [];
  let next = 0;
  const lanes = Array.from({length: limit}, async () => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = {status: 'fulfilled', value: await worker(items[index])};
      } catch (error) {
        results[index] = {status: 'rejected', reason: error};
      }
    }
  });
  await Promise.all(lanes);

  return results;
}
