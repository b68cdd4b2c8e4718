/**
 * REST dispatcher.
 * Every request passes the process-wide limiter, then its route's bucket;
 * the exchange runs under the bucket's permit so the headers it returns are
 * recorded before the next caller is considered.
 */

import type { z } from 'zod';
import { logger } from '../shared/logger.js';
import { HttpError, RateLimitExceededError } from '../shared/errors.js';
import { RateLimitStorage } from '../ratelimit/storage.js';
import type { Bucket } from '../ratelimit/bucket.js';
import { parseRateLimitHeaders, RateLimitBodySchema, secondsToMs } from './headers.js';
import type { Authentication } from './authentication.js';
import type { Route } from './route.js';

export interface RestClientOptions {
  /** API root without the version segment, e.g. `https://discord.com/api`. */
  baseUrl: string;
  apiVersion: number;
  /** How many times a 429 is retried before giving up. */
  maxRetries: number;
  /** Timeout for a single HTTP exchange. */
  timeoutMs: number;
  /** Requests per second allowed across all routes for one credential. */
  globalLimit: number;
}

export interface RequestOptions {
  auth?: Authentication;
  /** JSON-serialized into the request body. */
  body?: unknown;
  query?: Record<string, string | number | boolean | undefined>;
  headers?: Record<string, string>;
  /** Audit log reason, sent as X-Audit-Log-Reason. */
  reason?: string;
  /** When false, a request that would wait on a limiter rejects with RateLimitedError. */
  wait?: boolean;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RestClientOptions = {
  baseUrl: 'https://discord.com/api',
  apiVersion: 10,
  maxRetries: 5,
  timeoutMs: 15_000,
  globalLimit: 50,
};

const USER_AGENT = 'DiscordBot (chatwire, 0.1.0)';

/** Fallback wait for a 429 that reports no duration at all. */
const DEFAULT_RETRY_AFTER_MS = 1000;

type Exchange =
  | { kind: 'response'; response: Response }
  | { kind: 'rate-limited'; retryAfterMs: number; global: boolean; body: string };

const log = logger.child({ component: 'rest' });

export class RestClient {
  private readonly options: RestClientOptions;
  private readonly storages = new Map<string, RateLimitStorage>();

  constructor(options: Partial<RestClientOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Rate limit state for a credential (unauthenticated calls share the empty key). */
  storageFor(auth?: Authentication): RateLimitStorage {
    const key = auth?.rateLimitKey ?? '';
    let storage = this.storages.get(key);
    if (!storage) {
      storage = new RateLimitStorage(this.options.globalLimit);
      this.storages.set(key, storage);
    }
    return storage;
  }

  /**
   * Send a request through the global limiter and the route's bucket.
   * @returns The successful (2xx) response with its body unread.
   * @throws RateLimitedError when `wait` is false and a limiter would suspend.
   * @throws RateLimitExceededError when 429s outlast `maxRetries`.
   * @throws HttpError on any other non-OK response.
   */
  async request(route: Route, options: RequestOptions = {}): Promise<Response> {
    const storage = this.storageFor(options.auth);
    const acquireOptions = { wait: options.wait, signal: options.signal };

    for (let attempt = 0; ; attempt++) {
      if (!route.ignoreGlobal) {
        await storage.global.acquire(acquireOptions);
      }

      const bucket = storage.getBucket(route);
      const exchange = await bucket.acquire(
        () => this.exchange(route, bucket, storage, options),
        acquireOptions,
      );

      if (exchange.kind === 'response') {
        return exchange.response;
      }

      if (attempt >= this.options.maxRetries) {
        throw new RateLimitExceededError(route.toString(), exchange.retryAfterMs, exchange.global, exchange.body);
      }

      log.warn(
        { route: route.routeKey, retryAfterMs: exchange.retryAfterMs, global: exchange.global, attempt: attempt + 1 },
        `${route} rate limited${exchange.global ? ' (global)' : ''}, retrying after ${exchange.retryAfterMs}ms`,
      );
    }
  }

  /**
   * Send a request and validate its JSON body.
   * @throws ZodError when the body does not match `schema`.
   */
  async requestJson<T>(route: Route, schema: z.ZodType<T>, options: RequestOptions = {}): Promise<T> {
    const response = await this.request(route, options);
    const body: unknown = await response.json();
    return schema.parse(body);
  }

  /** One HTTP exchange. Runs under the bucket's permit. */
  private async exchange(
    route: Route,
    bucket: Bucket,
    storage: RateLimitStorage,
    options: RequestOptions,
  ): Promise<Exchange> {
    const url = this.buildUrl(route, options.query);
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      ...options.headers,
    };
    if (options.auth) {
      headers['Authorization'] = options.auth.header;
    }
    if (options.reason !== undefined) {
      headers['X-Audit-Log-Reason'] = encodeURIComponent(options.reason);
    }
    let body: string | undefined;
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    const timeoutSignal = AbortSignal.timeout(this.options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeoutSignal]) : timeoutSignal;

    log.debug({ route: route.routeKey, url }, `Sending ${route}`);
    const start = performance.now();

    const response = await fetch(url, { method: route.method, headers, body, signal });

    const latencyMs = Math.round(performance.now() - start);
    this.recordHeaders(route, bucket, storage, response);

    if (response.status === 429) {
      const text = await response.text();
      const { retryAfterMs, global } = this.parseRateLimited(text, response.headers);

      if (global) {
        storage.global.update(0, retryAfterMs);
      } else {
        bucket.update(0, retryAfterMs);
      }
      return { kind: 'rate-limited', retryAfterMs, global, body: text };
    }

    if (!response.ok) {
      const text = await response.text();
      log.error({ route: route.routeKey, status: response.status, latencyMs }, `${route} returned ${response.status}`);
      throw new HttpError(route.toString(), response.status, text);
    }

    log.debug({ route: route.routeKey, status: response.status, latencyMs }, `${route} succeeded`);
    return { kind: 'response', response };
  }

  /** Feed the response's rate limit headers back into the bucket. */
  private recordHeaders(route: Route, bucket: Bucket, storage: RateLimitStorage, response: Response): void {
    const info = parseRateLimitHeaders(response.headers);

    if (!info) {
      if (response.ok && !bucket.metadata.unlimited) {
        bucket.markUnlimited();
        log.debug({ route: route.routeKey }, 'Route reported no rate limit, marking unlimited');
      }
      return;
    }

    if (info.global) {
      return;
    }
    if (info.remaining !== undefined && info.resetAfterMs !== undefined) {
      bucket.update(info.remaining, info.resetAfterMs, info.limit);
    } else if (info.limit !== undefined) {
      bucket.updateLimit(info.limit);
    }
    if (info.bucket !== undefined) {
      storage.discoverHash(route, info.bucket, bucket);
    }
  }

  /**
   * Work out how long a 429 asks us to wait and which limiter it came from.
   * The body's `retry_after` wins; headers are the fallback.
   */
  private parseRateLimited(text: string, headers: Headers): { retryAfterMs: number; global: boolean } {
    const headerInfo = parseRateLimitHeaders(headers);
    let parsedBody: unknown;
    try {
      parsedBody = JSON.parse(text);
    } catch {
      parsedBody = undefined;
    }
    const result = RateLimitBodySchema.safeParse(parsedBody);

    if (result.success) {
      return {
        retryAfterMs: Math.round(result.data.retry_after * 1000),
        global: result.data.global || (headerInfo?.global ?? false),
      };
    }

    return {
      retryAfterMs:
        secondsToMs(headers.get('retry-after')) ?? headerInfo?.resetAfterMs ?? DEFAULT_RETRY_AFTER_MS,
      global: headerInfo?.global ?? false,
    };
  }

  private buildUrl(route: Route, query?: RequestOptions['query']): string {
    const url = new URL(`${this.options.baseUrl}/v${this.options.apiVersion}${route.path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }
}
