/**
 * Rate limit gate for one route class.
 *
 * Callers are serialized in arrival order and hold the permit for the whole
 * unit of work passed to `acquire`. The gate never invents a replenishment
 * model: `remaining`, the reset time and the `unlimited` flag only change
 * through the update methods (fed from server responses) and the single
 * decrement taken at grant time.
 */

import { FifoMutex } from '../shared/mutex.js';
import { RateLimitedError } from '../shared/errors.js';
import { sleepUntil } from '../shared/timers.js';
import type { BucketMetadata } from './metadata.js';
import type { AcquireOptions, BucketSnapshot } from './types.js';

export class Bucket {
  public readonly metadata: BucketMetadata;
  private readonly mutex = new FifoMutex();
  private _dirty = false;

  constructor(metadata: BucketMetadata) {
    this.metadata = metadata;
  }

  /**
   * True once a permit was granted under a known limit or the server
   * reported usage. Never reverts.
   */
  get dirty(): boolean {
    return this._dirty;
  }

  /** Callers holding or waiting for this gate. */
  get pending(): number {
    return this.mutex.pending;
  }

  /**
   * Run `work` under a permit from this gate. The permit is released when
   * `work` settles, whether it resolved or threw.
   * @throws RateLimitedError when `wait` is false and the gate would suspend.
   */
  async acquire<T>(work: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const { wait = true, signal } = options;

    await this.mutex.lock(signal);
    try {
      await this.reserve(wait, signal);
      return await work();
    } finally {
      this.mutex.unlock();
    }
  }

  /**
   * Apply the authoritative state reported by the server after an exchange.
   * @param remaining - Permits left in the current window.
   * @param resetAfterMs - Milliseconds until the window resets, measured from now.
   * @param limit - Permits per window, when the server reported it.
   */
  update(remaining: number, resetAfterMs: number, limit?: number): void {
    this.metadata.record(remaining, resetAfterMs, limit);
    this._dirty = true;
  }

  /** Record a reported limit that came without usage figures. */
  updateLimit(limit: number): void {
    this.metadata.recordLimit(limit);
  }

  /** Stop throttling until the server reports a limit again. */
  markUnlimited(): void {
    this.metadata.markUnlimited();
  }

  snapshot(id: string): BucketSnapshot {
    return {
      id,
      limit: this.metadata.limit,
      remaining: this.metadata.remaining,
      resetAt: this.metadata.resetAt,
      unlimited: this.metadata.unlimited,
      dirty: this._dirty,
      pending: this.pending,
    };
  }

  /** Reserve one permit. Runs with the mutex held. */
  private async reserve(wait: boolean, signal?: AbortSignal): Promise<void> {
    const metadata = this.metadata;

    if (metadata.unlimited) {
      return;
    }

    const remaining = metadata.remaining;

    if (remaining !== undefined && remaining > 0) {
      metadata.consume();
    } else if (remaining !== undefined) {
      const waitMs = (metadata.resetAt ?? 0) - Date.now();
      if (waitMs > 0) {
        if (!wait) {
          throw new RateLimitedError(waitMs);
        }
        await sleepUntil(() => metadata.resetAt, signal);
      }
    }

    if (metadata.limit !== undefined || remaining !== undefined) {
      this._dirty = true;
    }
  }
}
