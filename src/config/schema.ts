/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Schema for REST client settings. */
export const HttpSchema = z.object({
  baseUrl: z.url({ message: 'http.baseUrl must be a valid URL' }).default('https://discord.com/api'),
  apiVersion: z.number().int().positive().default(10),
  maxRetries: z.number().int().min(0).default(5),
  timeoutMs: z.number().int().min(1000).default(15000),
  globalLimit: z.number().int().positive().default(50),
});

/** Schema for one activity in a presence. */
export const ActivitySchema = z.object({
  name: z.string().min(1, { message: 'Activity name must not be empty' }),
  type: z.number().int().min(0).max(6).default(0),
  url: z.url().optional(),
  state: z.string().optional(),
});

/** Schema for the presence sent with identify. */
export const PresenceSchema = z.object({
  since: z.number().int().nullable().default(null),
  activities: z.array(ActivitySchema).default([]),
  status: z.enum(['online', 'idle', 'dnd', 'invisible', 'offline']).default('online'),
  afk: z.boolean().default(false),
});

/** Schema for reconnect backoff. */
export const ReconnectSchema = z
  .object({
    maxAttempts: z.number().int().min(0).default(10),
    baseDelayMs: z.number().int().min(0).default(1000),
    maxDelayMs: z.number().int().min(0).default(60000),
  })
  .refine((reconnect) => reconnect.maxDelayMs >= reconnect.baseDelayMs, {
    message: 'gateway.reconnect.maxDelayMs must not be lower than baseDelayMs',
    path: ['maxDelayMs'],
  });

/** Schema for gateway connection settings. */
export const GatewaySchema = z
  .object({
    intents: z.number().int().min(0, { message: 'gateway.intents must be a non-negative bitmask' }),
    url: z.url({ message: 'gateway.url must be a valid URL' }).optional(),
    shardCount: z.number().int().positive().optional(),
    shardIds: z
      .array(z.number().int().min(0))
      .min(1, { message: 'gateway.shardIds must list at least one shard' })
      .optional(),
    maxConcurrency: z.number().int().positive().optional(),
    compress: z.boolean().default(true),
    largeThreshold: z.number().int().min(50).max(250).default(50),
    presence: PresenceSchema.optional(),
    identifyWindowMs: z.number().int().min(0).default(5000),
    reconnect: ReconnectSchema.prefault({}),
  })
  .refine((gateway) => !gateway.shardIds || new Set(gateway.shardIds).size === gateway.shardIds.length, {
    message: 'gateway.shardIds must not contain duplicates',
    path: ['shardIds'],
  })
  .refine(
    (gateway) => {
      const { shardIds, shardCount } = gateway;
      if (!shardIds || shardCount === undefined) return true;
      return shardIds.every((id) => id < shardCount);
    },
    {
      message: 'gateway.shardIds entries must be lower than gateway.shardCount',
      path: ['shardIds'],
    },
  );

/** Top-level config schema. */
export const ConfigSchema = z.object({
  version: z.literal(1),
  token: z.string().min(1, { message: 'token must not be empty (set it here or in CHATWIRE_TOKEN)' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  http: HttpSchema.prefault({}),
  gateway: GatewaySchema,
});
