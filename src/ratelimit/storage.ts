/**
 * Rate limit state for one rate-limit key (one token).
 *
 * A route class starts out keyed by its method and path template plus its
 * major parameters. Once the server reports the bucket hash behind it, the
 * class is re-keyed by that hash so every route sharing the hash shares one
 * ledger entry and one gate.
 */

import { logger } from '../shared/logger.js';
import { Bucket } from './bucket.js';
import { BucketMetadata } from './metadata.js';
import { WindowLimiter } from './window-limiter.js';
import type { BucketSnapshot } from './types.js';

/** What storage needs to know about a route to place it in a bucket. */
export interface RateLimitedRoute {
  /** Method plus path template, e.g. `GET /channels/{channel_id}`. */
  readonly routeKey: string;
  /** Values of the major parameters, joined. */
  readonly majorParams: string;
}

const log = logger.child({ component: 'ratelimit' });

export class RateLimitStorage {
  public readonly global: WindowLimiter;
  private readonly routeHashes = new Map<string, string>();
  private readonly ledger = new Map<string, BucketMetadata>();
  private readonly buckets = new Map<string, Bucket>();

  /**
   * @param globalLimit - Requests per `globalWindowMs` allowed across all routes.
   * @param globalWindowMs - Length of the global window.
   */
  constructor(globalLimit: number, globalWindowMs: number = 1000) {
    this.global = new WindowLimiter(globalLimit, globalWindowMs);
  }

  /** Bucket currently serving `route`, created on first use. */
  getBucket(route: RateLimitedRoute): Bucket {
    const id = this.classId(route);
    let bucket = this.buckets.get(id);
    if (!bucket) {
      let metadata = this.ledger.get(id);
      if (!metadata) {
        metadata = new BucketMetadata();
        this.ledger.set(id, metadata);
      }
      bucket = new Bucket(metadata);
      this.buckets.set(id, bucket);
    }
    return bucket;
  }

  /**
   * Record the bucket hash the server reported for `route`.
   * When a gate already exists for the hash, it keeps serving unless it has
   * never been used and `current` has.
   * @returns The bucket that serves `route` from now on.
   */
  discoverHash(route: RateLimitedRoute, hash: string, current: Bucket): Bucket {
    if (this.routeHashes.get(route.routeKey) === hash) {
      return this.buckets.get(this.classId(route)) ?? current;
    }

    const previousId = this.classId(route);
    this.routeHashes.set(route.routeKey, hash);
    const id = this.classId(route);

    const existing = this.buckets.get(id);
    let serving = current;
    if (!existing || (!existing.dirty && current.dirty)) {
      this.buckets.set(id, current);
      this.ledger.set(id, current.metadata);
    } else {
      serving = existing;
    }

    if (previousId !== id) {
      this.buckets.delete(previousId);
      this.ledger.delete(previousId);
    }

    log.debug({ route: route.routeKey, hash, merged: existing !== undefined }, 'Discovered bucket hash');
    return serving;
  }

  /** Bucket hash reported for a route key, if any. */
  hashFor(routeKey: string): string | undefined {
    return this.routeHashes.get(routeKey);
  }

  /** State of every bucket, for monitoring. */
  snapshot(): BucketSnapshot[] {
    return Array.from(this.buckets, ([id, bucket]) => bucket.snapshot(id));
  }

  private classId(route: RateLimitedRoute): string {
    const key = this.routeHashes.get(route.routeKey) ?? route.routeKey;
    return `${key}:${route.majorParams}`;
  }
}
