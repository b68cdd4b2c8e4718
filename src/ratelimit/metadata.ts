/**
 * Shared ledger entry for one route class.
 * Several buckets may hold the same instance once the server reveals that
 * their routes share a counter; they hold a handle, never a copy.
 */

import type { BucketMetadataInit } from './types.js';

export class BucketMetadata {
  private _limit?: number;
  private _unlimited: boolean;
  private _remaining?: number;
  private _resetAt?: number;

  constructor(init: BucketMetadataInit = {}) {
    this._limit = init.limit;
    this._unlimited = init.unlimited ?? false;
  }

  /** Maximum permits per window, or undefined when never observed. */
  get limit(): number | undefined {
    return this._limit;
  }

  /** When true the bucket never throttles, whatever `limit`/`remaining` say. */
  get unlimited(): boolean {
    return this._unlimited;
  }

  /** Permits left in the current window, or undefined before the first report. */
  get remaining(): number | undefined {
    return this._remaining;
  }

  /** Epoch ms at which the current window resets, from the latest report. */
  get resetAt(): number | undefined {
    return this._resetAt;
  }

  /**
   * Record server-reported state. Only `Bucket.update` calls this; the
   * reset time is derived from the report, never extrapolated. Any report
   * means the route is limited after all.
   */
  record(remaining: number, resetAfterMs: number, limit?: number, now: number = Date.now()): void {
    this._remaining = remaining;
    this._resetAt = now + resetAfterMs;
    this._unlimited = false;
    if (limit !== undefined) {
      this._limit = limit;
    }
  }

  /** Record a reported limit without usage. Clears `unlimited`. */
  recordLimit(limit: number): void {
    this._limit = limit;
    this._unlimited = false;
  }

  /** The server answered without rate limit headers. */
  markUnlimited(): void {
    this._unlimited = true;
  }

  /** Spend one permit. Only called by a bucket granting under `remaining > 0`. */
  consume(): void {
    if (this._remaining !== undefined && this._remaining > 0) {
      this._remaining -= 1;
    }
  }
}
