/**
 * Async primitives: sleep and a promise-chain mutex.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Serializes async critical sections. Each `runExclusive` call queues behind
 * all previous callers; the lock is released even when `fn` throws.
 */
export class AsyncMutex {
  private chain: Promise<void> = Promise.resolve();

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const waitFor = this.chain;
    this.chain = gate;

    await waitFor;
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
