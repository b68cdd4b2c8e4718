/**
 * Gateway types: connection states, lifecycle notifications, the consumer
 * sink and the options shared by shards and the shard manager.
 */

import type { GatewayError } from '../shared/errors.js';
import type { GatewayPayload } from './codec.js';

/** Lifecycle state of one shard connection. */
export type ShardState =
  | 'disconnected'
  | 'connecting'
  | 'identifying'
  | 'resuming'
  | 'ready'
  | 'reconnecting';

/** Lifecycle notifications delivered to the sink, separate from payloads. */
export type ShardLifecycleEvent =
  | { type: 'connected'; heartbeatIntervalMs: number }
  | { type: 'identified'; sessionId: string }
  | { type: 'resumed'; sessionId: string }
  | {
      type: 'disconnected';
      /** Close code, absent for dropped transports and client-side decisions. */
      code?: number;
      reason: string;
      /** Classified failure, when the disconnect has one. */
      error?: GatewayError;
      /** The next connection will resume the session. */
      resumable: boolean;
      /** False once the shard has given up and is terminal. */
      willReconnect: boolean;
    };

/**
 * Consumer of everything a shard receives. Calls are awaited in order per
 * shard, so a slow consumer slows that shard's read loop.
 */
export interface GatewaySink {
  onPayload(shardId: number, payload: GatewayPayload): void | Promise<void>;
  onLifecycle?(shardId: number, event: ShardLifecycleEvent): void | Promise<void>;
}

/** Activity shown in a presence update. */
export interface PresenceActivity {
  name: string;
  type: number;
  url?: string;
  state?: string;
}

/** Presence sent with identify and presence updates. */
export interface PresenceData {
  since: number | null;
  activities: PresenceActivity[];
  status: 'online' | 'idle' | 'dnd' | 'invisible' | 'offline';
  afk: boolean;
}

/** Exponential backoff between reconnect attempts. */
export interface ReconnectPolicy {
  /** Attempts allowed before giving up; 0 means unlimited. Resets once a session is ready. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** What the reconnect-eligibility check is told about the attempt it judges. */
export interface ReconnectContext {
  shardId: number;
  /** 1-based count of consecutive attempts since the last ready session. */
  attempt: number;
  lastError?: GatewayError;
}

/** Decides whether a reconnect attempt may go ahead. */
export type ReconnectCheck = (context: ReconnectContext) => boolean | Promise<boolean>;

/** Waits for an identify permit for `shardId`. Must honour `signal`. */
export type IdentifyThrottle = (shardId: number, signal: AbortSignal) => Promise<void>;

/** Point-in-time status of a shard. */
export interface ShardStatus {
  shardId: number;
  state: ShardState;
  latencyMs?: number;
  sessionId?: string;
  error?: GatewayError;
}
