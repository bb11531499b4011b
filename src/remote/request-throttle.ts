/**
 * Minimum-interval gate for outbound requests.
 *
 * The "last permitted" timestamp is never exposed; callers only get the
 * check-and-advance operation, run inside a mutex so concurrent callers are
 * admitted one at a time, at least `1000 / ratePerSecond` ms apart.
 */

import { AsyncMutex, sleep } from '../shared/async.js';

export interface RequestGate {
  /** Resolves once the caller may issue one request. Never rejects. */
  wait(): Promise<void>;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/** Monotonic: wall-clock steps never stretch or shrink an interval. */
export const systemClock: Clock = {
  now: () => performance.now(),
  sleep,
};

export class RequestThrottle implements RequestGate {
  private readonly mutex = new AsyncMutex();
  private readonly intervalMs: number;
  private lastPermittedAt: number | null = null;

  constructor(
    ratePerSecond: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${ratePerSecond}`);
    }
    this.intervalMs = 1000 / ratePerSecond;
  }

  get minimumIntervalMs(): number {
    return this.intervalMs;
  }

  async wait(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.lastPermittedAt !== null) {
        const remaining = this.lastPermittedAt + this.intervalMs - this.clock.now();
        if (remaining > 0) {
          await this.clock.sleep(remaining);
        }
      }
      this.lastPermittedAt = this.clock.now();
    });
  }
}
