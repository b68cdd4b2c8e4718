/**
 * Fixed-window limiter for limits that are known up front rather than
 * discovered from headers: the process-wide REST limit, the identify
 * concurrency buckets and the per-connection gateway send limit.
 *
 * A window opens with the first permit granted after the previous one
 * expired. Waiters are served in arrival order.
 */

import { FifoMutex } from '../shared/mutex.js';
import { RateLimitedError } from '../shared/errors.js';
import { sleepUntil } from '../shared/timers.js';
import type { AcquireOptions } from './types.js';

export class WindowLimiter {
  public readonly limit: number;
  public readonly windowMs: number;
  private readonly mutex = new FifoMutex();
  private used = 0;
  private windowEnd?: number;

  constructor(limit: number, windowMs: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`WindowLimiter limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
    this.windowMs = windowMs;
  }

  /** Permits still available in the current window. */
  get remaining(): number {
    return this.windowExpired(Date.now()) ? this.limit : Math.max(0, this.limit - this.used);
  }

  /** Callers holding or waiting for the limiter. */
  get pending(): number {
    return this.mutex.pending;
  }

  /**
   * Reserve one permit, suspending until the window resets when it is full.
   * @throws RateLimitedError when `wait` is false and a permit is not available now.
   */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    const { wait = true, signal } = options;

    await this.mutex.lock(signal);
    try {
      for (;;) {
        const now = Date.now();
        if (this.windowExpired(now)) {
          this.used = 0;
          this.windowEnd = undefined;
        }

        if (this.used < this.limit) {
          this.used += 1;
          this.windowEnd ??= now + this.windowMs;
          return;
        }

        if (!wait) {
          throw new RateLimitedError((this.windowEnd ?? now) - now);
        }
        await sleepUntil(() => this.windowEnd, signal);
      }
    } finally {
      this.mutex.unlock();
    }
  }

  /**
   * Apply a server-reported state, e.g. a global 429 pausing every request.
   * @param remaining - Permits left until the reset.
   * @param resetAfterMs - Milliseconds until the window resets.
   */
  update(remaining: number, resetAfterMs: number): void {
    this.used = Math.max(0, this.limit - remaining);
    this.windowEnd = Date.now() + resetAfterMs;
  }

  private windowExpired(now: number): boolean {
    return this.windowEnd === undefined || now >= this.windowEnd;
  }
}
