/**
 * TypeScript types inferred from Zod schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  HttpSchema,
  GatewaySchema,
  PresenceSchema,
  ReconnectSchema,
} from './schema.js';

/** Fully validated configuration. */
export type Config = z.infer<typeof ConfigSchema>;

export type HttpConfig = z.infer<typeof HttpSchema>;

export type GatewayConfig = z.infer<typeof GatewaySchema>;

export type PresenceConfig = z.infer<typeof PresenceSchema>;

export type ReconnectConfig = z.infer<typeof ReconnectSchema>;

export {
  ConfigSchema,
  HttpSchema,
  GatewaySchema,
  PresenceSchema,
  ReconnectSchema,
  ActivitySchema,
} from './schema.js';
