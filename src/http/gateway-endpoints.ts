/**
 * REST endpoints that describe how to connect to the gateway.
 */

import { z } from 'zod';
import { Route } from './route.js';
import type { Authentication } from './authentication.js';
import type { RestClient } from './rest-client.js';

export const GatewayInfoSchema = z.object({
  url: z.string().min(1),
});

export const SessionStartLimitSchema = z.object({
  total: z.number().int().nonnegative(),
  remaining: z.number().int().nonnegative(),
  reset_after: z.number().nonnegative(),
  max_concurrency: z.number().int().positive(),
});

export const GatewayBotInfoSchema = GatewayInfoSchema.extend({
  shards: z.number().int().positive(),
  session_start_limit: SessionStartLimitSchema,
});

export type GatewayInfo = z.infer<typeof GatewayInfoSchema>;
export type GatewayBotInfo = z.infer<typeof GatewayBotInfoSchema>;

export interface GatewayBotOptions {
  /** When false, rejects with RateLimitedError instead of waiting on a limiter. */
  wait?: boolean;
  signal?: AbortSignal;
}

/**
 * Gateway URL for unauthenticated clients.
 * Does not count against the global limit.
 */
export async function getGateway(client: RestClient): Promise<GatewayInfo> {
  const route = new Route('GET', '/gateway', {}, { ignoreGlobal: true });
  return client.requestJson(route, GatewayInfoSchema);
}

/**
 * Gateway URL, recommended shard count and session start limits for a bot.
 * @throws RateLimitedError when `wait` is false and the request would wait.
 */
export async function getGatewayBot(
  client: RestClient,
  auth: Authentication,
  options: GatewayBotOptions = {},
): Promise<GatewayBotInfo> {
  const route = new Route('GET', '/gateway/bot');
  return client.requestJson(route, GatewayBotInfoSchema, {
    auth,
    wait: options.wait,
    signal: options.signal,
  });
}
