/**
 * Rate limit header parsing.
 * The server reports every duration in (fractional) seconds; these helpers
 * normalize to milliseconds.
 */

import { z } from 'zod';

/** Normalized rate limit information from a REST response. */
export interface RateLimitHeaders {
  /** Maximum requests allowed in the bucket's window. */
  limit?: number;
  /** Requests remaining in the current window. */
  remaining?: number;
  /** Milliseconds until the window resets. */
  resetAfterMs?: number;
  /** Opaque bucket hash shared by routes with one counter. */
  bucket?: string;
  /** The response came from the process-wide limit. */
  global: boolean;
  /** `user`, `global` or `shared`. */
  scope?: string;
}

/** Body of a 429 response. */
export const RateLimitBodySchema = z.object({
  message: z.string().optional(),
  retry_after: z.number().nonnegative(),
  global: z.boolean().default(false),
  code: z.number().optional(),
});

export type RateLimitBody = z.infer<typeof RateLimitBodySchema>;

function parseNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

/** Convert a seconds header value to milliseconds. */
export function secondsToMs(value: string | null): number | undefined {
  const seconds = parseNumber(value);
  return seconds === undefined ? undefined : Math.round(seconds * 1000);
}

/**
 * Parse the X-RateLimit-* headers.
 * @returns Normalized info, or null when the response carried none (the route is not rate limited).
 */
export function parseRateLimitHeaders(headers: Headers): RateLimitHeaders | null {
  const limit = parseNumber(headers.get('x-ratelimit-limit'));
  const remaining = parseNumber(headers.get('x-ratelimit-remaining'));
  const resetAfterMs = secondsToMs(headers.get('x-ratelimit-reset-after'));
  const bucket = headers.get('x-ratelimit-bucket') ?? undefined;
  const global = headers.get('x-ratelimit-global')?.toLowerCase() === 'true';
  const scope = headers.get('x-ratelimit-scope') ?? undefined;

  if (
    limit === undefined &&
    remaining === undefined &&
    resetAfterMs === undefined &&
    bucket === undefined &&
    !global
  ) {
    return null;
  }

  return { limit, remaining, resetAfterMs, bucket, global, scope };
}
