/**
 * Rate limit types shared by the REST dispatcher and the gateway throttles.
 */

/** Initial values for a ledger entry. */
export interface BucketMetadataInit {
  /** Known permit limit per window. */
  limit?: number;
  /** Exempt from throttling. */
  unlimited?: boolean;
}

/** Options accepted by every gate acquisition. */
export interface AcquireOptions {
  /**
   * Suspend until a permit is available (default). When false, a grant that
   * would suspend rejects with RateLimitedError instead.
   */
  wait?: boolean;
  /** Cancels a pending acquisition; the gate is left free for the next waiter. */
  signal?: AbortSignal;
}

/** Point-in-time view of a bucket for logging and monitoring. */
export interface BucketSnapshot {
  id: string;
  limit?: number;
  remaining?: number;
  resetAt?: number;
  unlimited: boolean;
  dirty: boolean;
  pending: number;
}
