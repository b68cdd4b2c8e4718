/**
 * Gateway payload decoding and validation.
 */

import { z } from 'zod';

export const GatewayPayloadSchema = z.object({
  op: z.number().int(),
  d: z.unknown(),
  s: z.number().int().nullable().optional(),
  t: z.string().nullable().optional(),
});

export type GatewayPayload = z.infer<typeof GatewayPayloadSchema>;

/** Payload the client sends. */
export interface GatewaySendPayload {
  op: number;
  d: unknown;
}

export const HelloDataSchema = z.object({
  heartbeat_interval: z.number().positive(),
});

export const ReadyDataSchema = z.object({
  session_id: z.string().min(1),
  resume_gateway_url: z.string().min(1).optional(),
});

const textDecoder = new TextDecoder();

/** Decode UTF-8 bytes or pass text through. */
export function toText(data: Buffer | string): string {
  return typeof data === 'string' ? data : textDecoder.decode(data);
}

/**
 * Parse and validate one payload.
 * @returns The payload, or null when the text is not JSON or not a gateway payload.
 */
export function decodePayload(text: string): GatewayPayload | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const result = GatewayPayloadSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function encodePayload(payload: GatewaySendPayload): string {
  return JSON.stringify(payload);
}
