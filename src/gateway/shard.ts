/**
 * One gateway connection.
 *
 * A shard owns at most one transport at a time and drives it through
 * connecting → identifying | resuming → ready. Losing the transport moves it
 * to reconnecting, where the close is classified and a new transport is
 * opened after backoff; the session survives when the disconnect allows a
 * resume. Fatal closes and refused reconnects end in disconnected.
 *
 * While connected, three tasks share the connection's abort signal: the read
 * loop, the heartbeat loop and the handshake. Whichever task decides the
 * connection is over records why and aborts the other two.
 */

import { GatewayOpcodes } from 'discord-api-types/v10';
import { logger, type Logger } from '../shared/logger.js';
import {
  GatewayError,
  ReconnectCheckFailedError,
  ShardStateError,
  isAbortError,
} from '../shared/errors.js';
import { sleep } from '../shared/timers.js';
import { WindowLimiter } from '../ratelimit/window-limiter.js';
import {
  decodePayload,
  encodePayload,
  HelloDataSchema,
  ReadyDataSchema,
  toText,
  type GatewayPayload,
  type GatewaySendPayload,
} from './codec.js';
import { classifyClose } from './close-codes.js';
import { Decompressor } from './decompressor.js';
import { wsTransportFactory, type GatewayTransport, type TransportFactory } from './transport.js';
import type {
  GatewaySink,
  IdentifyThrottle,
  PresenceData,
  ReconnectCheck,
  ReconnectContext,
  ReconnectPolicy,
  ShardLifecycleEvent,
  ShardState,
  ShardStatus,
} from './types.js';

/** Consumer payloads allowed per window. The gateway closes at 120 per 60s. */
export const SEND_LIMIT = 110;
export const SEND_WINDOW_MS = 60_000;

/** Close code used when the session should stay resumable. */
const RESUMABLE_CLOSE_CODE = 4000;
const NORMAL_CLOSE_CODE = 1000;

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  maxAttempts: 10,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
};

export interface ShardOptions {
  shardId: number;
  shardCount: number;
  token: string;
  intents: number;
  /** Gateway URL from `GET /gateway/bot`, without query parameters. */
  gatewayUrl: string;
  apiVersion?: number;
  /** Request zlib-stream transport compression. Defaults to true. */
  compress?: boolean;
  largeThreshold?: number;
  presence?: PresenceData;
  reconnect?: Partial<ReconnectPolicy>;
  /** Replaces the default `maxAttempts` check. */
  reconnectCheck?: ReconnectCheck;
  /** Awaited before every identify; resumes skip it. */
  identifyThrottle?: IdentifyThrottle;
  transportFactory?: TransportFactory;
  sink?: GatewaySink;
  /** Source of heartbeat jitter in [0, 1). */
  random?: () => number;
}

/** Why a connection ended. */
interface Disconnect {
  code?: number;
  reason: string;
  resumable: boolean;
  fatal: boolean;
  error?: GatewayError;
}

/** Per-connection context shared by the read loop, heartbeat and handshake. */
interface Connection {
  transport: GatewayTransport;
  signal: AbortSignal;
  resume: boolean;
  tasks: Promise<void>[];
  end(disconnect: Disconnect): void;
}

interface Started {
  promise: Promise<void>;
  resolve: () => void;
  reject: (reason: unknown) => void;
}

function started(): Started {
  let resolve: () => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new GatewayError(message);
}

export class Shard {
  readonly id: number;
  readonly shardCount: number;

  private readonly options: ShardOptions;
  private readonly policy: ReconnectPolicy;
  private readonly transportFactory: TransportFactory;
  private readonly random: () => number;
  private readonly sendLimiter = new WindowLimiter(SEND_LIMIT, SEND_WINDOW_MS);
  private readonly log: Logger;

  private _state: ShardState = 'disconnected';
  private sessionId?: string;
  private sequence: number | null = null;
  private resumeUrl?: string;
  private heartbeatAcked = true;
  private lastHeartbeatAt?: number;
  private _latencyMs?: number;
  private attempts = 0;
  private lastError?: GatewayError;

  private lifetime?: AbortController;
  private loop?: Promise<void>;
  private connection?: Connection;

  constructor(options: ShardOptions) {
    this.options = options;
    this.id = options.shardId;
    this.shardCount = options.shardCount;
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect };
    this.transportFactory = options.transportFactory ?? wsTransportFactory;
    this.random = options.random ?? Math.random;
    this.log = logger.child({ component: 'shard', shardId: options.shardId });
  }

  get state(): ShardState {
    return this._state;
  }

  /** Round trip of the last acknowledged heartbeat. */
  get latencyMs(): number | undefined {
    return this._latencyMs;
  }

  status(): ShardStatus {
    return {
      shardId: this.id,
      state: this._state,
      latencyMs: this._latencyMs,
      sessionId: this.sessionId,
      error: this.lastError,
    };
  }

  /**
   * Start the connection lifecycle in the background.
   * Resolves once the first transport is open and the shard is `connecting`.
   * @throws ShardStateError when the shard is already running.
   * @throws the terminal error when the shard gives up before connecting.
   */
  async connect(): Promise<void> {
    if (this.loop || this._state !== 'disconnected') {
      throw new ShardStateError(this.id, 'connect', this._state);
    }

    const lifetime = new AbortController();
    const first = started();
    this.lifetime = lifetime;
    this.lastError = undefined;
    this.attempts = 0;

    const loop = this.run(lifetime.signal, first).finally(() => {
      if (this.loop === loop) this.loop = undefined;
    });
    this.loop = loop;

    await first.promise;
  }

  /**
   * Close the connection and stop reconnecting. Cancels the heartbeat, the
   * read loop and any pending identify permit.
   */
  async close(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.lifetime?.abort();
    await loop;
  }

  /** Drop the current connection and resume on a new one. */
  requestReconnect(): void {
    if (!this.connection) {
      throw new ShardStateError(this.id, 'reconnect', this._state);
    }
    this.connection.end({ reason: 'reconnect requested', resumable: true, fatal: false });
  }

  /**
   * Send a consumer payload, waiting for the send limit when it is spent.
   * @throws ShardStateError unless the shard is ready.
   */
  async send(payload: GatewaySendPayload): Promise<void> {
    if (this._state !== 'ready') {
      throw new ShardStateError(this.id, 'send', this._state);
    }
    await this.sendLimiter.acquire({ signal: this.lifetime?.signal });

    const connection = this.connection;
    if (this._state !== 'ready' || !connection) {
      throw new ShardStateError(this.id, 'send', this._state);
    }
    await connection.transport.send(encodePayload(payload));
  }

  /** Replace the presence shown for this shard's session. */
  async updatePresence(presence: PresenceData): Promise<void> {
    await this.send({ op: GatewayOpcodes.PresenceUpdate, d: presence });
  }

  private async run(signal: AbortSignal, first: Started): Promise<void> {
    let resumable = false;

    try {
      for (;;) {
        const disconnect = await this.runConnection(signal, resumable, first);
        resumable = disconnect.resumable;
        if (!resumable) this.clearSession();
        if (disconnect.error) this.lastError = disconnect.error;

        if (disconnect.fatal) {
          this.log.error({ err: disconnect.error, code: disconnect.code }, `Shard ${this.id} stopped: ${disconnect.reason}`);
          await this.terminate(disconnect, disconnect.error);
          first.reject(disconnect.error ?? new GatewayError(disconnect.reason));
          return;
        }

        this._state = 'reconnecting';
        this.attempts += 1;
        const context: ReconnectContext = { shardId: this.id, attempt: this.attempts, lastError: disconnect.error };
        if (!(await this.mayReconnect(context))) {
          const error = new ReconnectCheckFailedError(this.id, this.attempts);
          this.lastError = error;
          this.log.error({ attempt: this.attempts }, `Shard ${this.id} giving up after ${disconnect.reason}`);
          await this.terminate(disconnect, error);
          first.reject(error);
          return;
        }

        const delayMs = this.backoff(this.attempts);
        this.log.warn(
          { code: disconnect.code, resumable, attempt: this.attempts, delayMs, err: disconnect.error },
          `Shard ${this.id} disconnected (${disconnect.reason}), reconnecting in ${delayMs}ms`,
        );
        await this.emit({
          type: 'disconnected',
          code: disconnect.code,
          reason: disconnect.reason,
          error: disconnect.error,
          resumable,
          willReconnect: true,
        });
        await sleep(delayMs, signal);
      }
    } catch (err) {
      this._state = 'disconnected';
      this.connection = undefined;
      if (signal.aborted) {
        this.clearSession();
        this.log.info(`Shard ${this.id} closed`);
        first.reject(signal.reason);
        await this.finish({ type: 'disconnected', reason: 'closed by client', resumable: false, willReconnect: false });
        return;
      }

      const error = toGatewayError(err);
      this.lastError = error;
      this.log.error({ err }, `Shard ${this.id} lifecycle failed`);
      first.reject(error);
      await this.finish({ type: 'disconnected', reason: error.message, error, resumable: false, willReconnect: false });
    }
  }

  /**
   * Open one transport and run it until it ends.
   * @throws the lifetime signal's reason when the shard is closed.
   */
  private async runConnection(signal: AbortSignal, resumable: boolean, first: Started): Promise<Disconnect> {
    const resume = resumable && this.sessionId !== undefined && this.sequence !== null;
    const url = this.buildUrl(resume && this.resumeUrl ? this.resumeUrl : this.options.gatewayUrl);

    let transport: GatewayTransport;
    try {
      transport = await this.transportFactory(url, signal);
    } catch (err) {
      if (signal.aborted) throw err;
      return { reason: 'transport failed to open', resumable, fatal: false, error: toGatewayError(err) };
    }

    const controller = new AbortController();
    let outcome: Disconnect | undefined;
    const connection: Connection = {
      transport,
      signal: AbortSignal.any([signal, controller.signal]),
      resume,
      tasks: [],
      end: (disconnect) => {
        outcome ??= disconnect;
        controller.abort();
      },
    };

    const decompressor = this.options.compress === false ? undefined : new Decompressor();
    this.connection = connection;
    this.heartbeatAcked = true;
    this._state = 'connecting';
    this.log.debug({ url, resume }, `Shard ${this.id} connecting`);
    first.resolve();

    try {
      const ended = await this.read(connection, decompressor);
      outcome ??= ended;
    } catch (err) {
      if (signal.aborted) throw err;
      if (!outcome) {
        outcome = isAbortError(err)
          ? { reason: 'connection aborted', resumable: true, fatal: false }
          : { reason: 'read failed', resumable: true, fatal: false, error: toGatewayError(err) };
      }
    } finally {
      controller.abort();
      await Promise.all(connection.tasks);
      decompressor?.destroy();
      this.connection = undefined;
      const code = !signal.aborted && outcome?.resumable ? RESUMABLE_CLOSE_CODE : NORMAL_CLOSE_CODE;
      transport.close(code, outcome?.reason ?? 'closing');
    }
    return outcome ?? { reason: 'connection ended', resumable: true, fatal: false };
  }

  /** Read loop. Returns when the transport closes or a payload ends the connection. */
  private async read(connection: Connection, decompressor?: Decompressor): Promise<Disconnect> {
    for (;;) {
      const event = await connection.transport.receive(connection.signal);

      if (event.type === 'close') {
        return this.classify(event.code, event.reason);
      }

      let texts: string[];
      if (typeof event.data === 'string' || !decompressor) {
        texts = [toText(event.data)];
      } else {
        try {
          texts = (await decompressor.feed(event.data)).map(toText);
        } catch (err) {
          return { reason: 'decompression failed', resumable: true, fatal: false, error: toGatewayError(err) };
        }
      }

      for (const text of texts) {
        const payload = decodePayload(text);
        if (!payload) {
          this.log.warn({ length: text.length }, 'Dropping malformed gateway payload');
          continue;
        }
        const disconnect = await this.handlePayload(connection, payload);
        if (disconnect) return disconnect;
      }
    }
  }

  private classify(code: number | undefined, reason: string): Disconnect {
    if (code === undefined) {
      return { reason: 'connection dropped', resumable: true, fatal: false };
    }
    const classification = classifyClose(code, reason);
    if (classification.error && !classification.fatal) {
      this.log.warn({ code, reason }, `Unhandled close code ${code}`);
    }
    return {
      code,
      reason: reason || `closed with code ${code}`,
      resumable: classification.resumable,
      fatal: classification.fatal,
      error: classification.error,
    };
  }

  private async handlePayload(connection: Connection, payload: GatewayPayload): Promise<Disconnect | undefined> {
    if (typeof payload.s === 'number') {
      this.sequence = payload.s;
    }

    switch (payload.op) {
      case GatewayOpcodes.Hello: {
        const hello = HelloDataSchema.safeParse(payload.d);
        if (!hello.success) {
          return { reason: 'malformed hello', resumable: connection.resume, fatal: false };
        }
        const intervalMs = hello.data.heartbeat_interval;
        this.spawn(connection, () => this.heartbeat(connection, intervalMs));
        this.spawn(connection, () => this.handshake(connection));
        await this.emit({ type: 'connected', heartbeatIntervalMs: intervalMs });
        return undefined;
      }

      case GatewayOpcodes.Heartbeat:
        await this.sendHeartbeat(connection);
        return undefined;

      case GatewayOpcodes.HeartbeatAck:
        this.heartbeatAcked = true;
        if (this.lastHeartbeatAt !== undefined) {
          this._latencyMs = Date.now() - this.lastHeartbeatAt;
        }
        return undefined;

      case GatewayOpcodes.Reconnect:
        return { reason: 'server requested reconnect', resumable: true, fatal: false };

      case GatewayOpcodes.InvalidSession: {
        const resumable = payload.d === true;
        return { reason: resumable ? 'session invalidated, resumable' : 'session invalidated', resumable, fatal: false };
      }

      case GatewayOpcodes.Dispatch:
        await this.dispatch(payload);
        return undefined;

      default:
        this.log.debug({ op: payload.op }, 'Ignoring unexpected opcode');
        return undefined;
    }
  }

  private async dispatch(payload: GatewayPayload): Promise<void> {
    if (payload.t === 'READY') {
      const ready = ReadyDataSchema.safeParse(payload.d);
      if (ready.success) {
        this.sessionId = ready.data.session_id;
        this.resumeUrl = ready.data.resume_gateway_url;
        this.markReady();
        this.log.info({ sessionId: this.sessionId }, `Shard ${this.id} ready`);
        await this.emit({ type: 'identified', sessionId: ready.data.session_id });
      } else {
        this.log.warn('READY without a session id');
      }
    } else if (payload.t === 'RESUMED' && this.sessionId !== undefined) {
      this.markReady();
      this.log.info({ sessionId: this.sessionId }, `Shard ${this.id} resumed`);
      await this.emit({ type: 'resumed', sessionId: this.sessionId });
    }

    const sink = this.options.sink;
    if (!sink) return;
    try {
      await sink.onPayload(this.id, payload);
    } catch (err) {
      this.log.error({ err, event: payload.t }, 'Payload handler failed');
    }
  }

  private markReady(): void {
    this._state = 'ready';
    this.attempts = 0;
    this.lastError = undefined;
  }

  /** First beat after a jittered fraction of the interval, then every interval. */
  private async heartbeat(connection: Connection, intervalMs: number): Promise<void> {
    await sleep(intervalMs * this.random(), connection.signal);
    for (;;) {
      if (!this.heartbeatAcked) {
        this.log.warn(`Shard ${this.id} heartbeat was not acknowledged, reconnecting`);
        connection.end({ reason: 'heartbeat not acknowledged', resumable: true, fatal: false });
        return;
      }
      await this.sendHeartbeat(connection);
      await sleep(intervalMs, connection.signal);
    }
  }

  private async sendHeartbeat(connection: Connection): Promise<void> {
    this.heartbeatAcked = false;
    this.lastHeartbeatAt = Date.now();
    await connection.transport.send(encodePayload({ op: GatewayOpcodes.Heartbeat, d: this.sequence }));
  }

  private async handshake(connection: Connection): Promise<void> {
    const { transport, signal } = connection;

    if (connection.resume && this.sessionId !== undefined) {
      this._state = 'resuming';
      await transport.send(
        encodePayload({
          op: GatewayOpcodes.Resume,
          d: { token: this.options.token, session_id: this.sessionId, seq: this.sequence },
        }),
      );
      return;
    }

    this._state = 'identifying';
    if (this.options.identifyThrottle) {
      await this.options.identifyThrottle(this.id, signal);
    }
    signal.throwIfAborted();

    const properties = { os: process.platform, browser: 'chatwire', device: 'chatwire' };
    await transport.send(
      encodePayload({
        op: GatewayOpcodes.Identify,
        d: {
          token: this.options.token,
          intents: this.options.intents,
          properties,
          shard: [this.id, this.shardCount],
          large_threshold: this.options.largeThreshold ?? 50,
          ...(this.options.presence ? { presence: this.options.presence } : {}),
        },
      }),
    );
    this.log.debug(`Shard ${this.id} identified`);
  }

  /** Run a connection task. Failures other than cancellation end the connection. */
  private spawn(connection: Connection, task: () => Promise<void>): void {
    const running = task().catch((err: unknown) => {
      if (connection.signal.aborted) return;
      connection.end({ reason: 'connection task failed', resumable: true, fatal: false, error: toGatewayError(err) });
    });
    connection.tasks.push(running);
  }

  private async mayReconnect(context: ReconnectContext): Promise<boolean> {
    if (this.options.reconnectCheck) {
      return this.options.reconnectCheck(context);
    }
    return this.policy.maxAttempts === 0 || context.attempt <= this.policy.maxAttempts;
  }

  private backoff(attempt: number): number {
    return Math.min(this.policy.baseDelayMs * 2 ** (attempt - 1), this.policy.maxDelayMs);
  }

  private async terminate(disconnect: Disconnect, error?: GatewayError): Promise<void> {
    this.clearSession();
    await this.finish({
      type: 'disconnected',
      code: disconnect.code,
      reason: disconnect.reason,
      error,
      resumable: false,
      willReconnect: false,
    });
  }

  /**
   * Emit the last event of a lifecycle. The shard is already stopped when
   * handlers see it, so they may connect it again or close it.
   */
  private async finish(event: ShardLifecycleEvent): Promise<void> {
    this._state = 'disconnected';
    this.loop = undefined;
    await this.emit(event);
  }

  private clearSession(): void {
    this.sessionId = undefined;
    this.sequence = null;
    this.resumeUrl = undefined;
  }

  private async emit(event: ShardLifecycleEvent): Promise<void> {
    const sink = this.options.sink;
    if (!sink?.onLifecycle) return;
    try {
      await sink.onLifecycle(this.id, event);
    } catch (err) {
      this.log.error({ err, event: event.type }, 'Lifecycle handler failed');
    }
  }

  private buildUrl(base: string): string {
    const url = new URL(base);
    url.searchParams.set('v', String(this.options.apiVersion ?? 10));
    url.searchParams.set('encoding', 'json');
    if (this.options.compress !== false) {
      url.searchParams.set('compress', 'zlib-stream');
    }
    return url.toString();
  }
}
