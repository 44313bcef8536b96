// SPDX-License-Identifier: Apache-2.0

/**
 * In-process mutual exclusion built on a promise chain. Callers queue in arrival order; a failing critical section
 * releases the lock like a successful one.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  public async runExclusive<T>(function_: () => Promise<T>): Promise<T> {
    const previous = this.tail;

    let release: () => void = () => {};
    const next = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => next);

    await previous;
    try {
      return await function_();
    } finally {
      release();
    }
  }
}
