/**
 * Owns every shard of one bot.
 *
 * Shards identify through per-bucket throttles: shard `id` belongs to bucket
 * `id % maxConcurrency`, and each bucket admits one identify per window.
 * Shards in the same bucket therefore identify one after another while
 * different buckets proceed in parallel. Resumes do not touch the throttle.
 */

import { logger } from '../shared/logger.js';
import { GatewayError, ShardStateError } from '../shared/errors.js';
import { WindowLimiter } from '../ratelimit/window-limiter.js';
import { BotAuthentication } from '../http/authentication.js';
import { RestClient } from '../http/rest-client.js';
import { getGatewayBot } from '../http/gateway-endpoints.js';
import { Shard } from './shard.js';
import type { GatewaySendPayload } from './codec.js';
import type { TransportFactory } from './transport.js';
import type {
  GatewaySink,
  PresenceData,
  ReconnectCheck,
  ReconnectPolicy,
  ShardLifecycleEvent,
  ShardStatus,
} from './types.js';

/** One identify per bucket per window, as documented by the gateway. */
export const DEFAULT_IDENTIFY_WINDOW_MS = 5000;

export interface ShardManagerOptions {
  token: string;
  intents: number;
  /** Total shards. Discovered from `GET /gateway/bot` when unset. */
  shardCount?: number;
  /** Subset of shards this process runs. Defaults to all of them. */
  shardIds?: number[];
  /** Identify buckets. Discovered from `GET /gateway/bot` when unset. */
  maxConcurrency?: number;
  /** Discovered from `GET /gateway/bot` when unset. */
  gatewayUrl?: string;
  apiVersion?: number;
  compress?: boolean;
  largeThreshold?: number;
  presence?: PresenceData;
  identifyWindowMs?: number;
  reconnect?: Partial<ReconnectPolicy>;
  reconnectCheck?: ReconnectCheck;
  /** Client used for discovery. A default client is created when needed. */
  rest?: RestClient;
  transportFactory?: TransportFactory;
  random?: () => number;
}

/** Connection parameters after discovery. */
export interface ShardPlan {
  shardCount: number;
  maxConcurrency: number;
  gatewayUrl: string;
  shardIds: number[];
}

const log = logger.child({ component: 'shard-manager' });

/**
 * Shard that receives events for a guild.
 * @param guildId - Guild snowflake as a decimal string.
 */
export function shardIdForGuild(guildId: string, shardCount: number): number {
  return Number((BigInt(guildId) >> 22n) % BigInt(shardCount));
}

export class ShardManager {
  private readonly options: ShardManagerOptions;
  private readonly sink: GatewaySink;
  private readonly shards = new Map<number, Shard>();
  private readonly identifyLimiters = new Map<number, WindowLimiter>();
  private readonly _failures = new Map<number, GatewayError>();
  private plan?: ShardPlan;

  constructor(options: ShardManagerOptions, sink: GatewaySink) {
    this.options = options;
    this.sink = sink;
  }

  /** Shards that stopped for good, with the error that stopped them. */
  get failures(): ReadonlyMap<number, GatewayError> {
    return this._failures;
  }

  get shardCount(): number | undefined {
    return this.plan?.shardCount;
  }

  /**
   * Discover missing parameters, then start every shard in turn. Each shard
   * is started once the previous one has an open transport. A shard that
   * gives up before connecting stays in `failures` for `restartShard`; the
   * others keep running.
   * @throws the first shard's error when no shard could be started.
   *   The manager is then empty and may be connected again.
   */
  async connect(): Promise<void> {
    if (this.shards.size > 0) {
      throw new GatewayError('Shard manager is already running');
    }
    const plan = await this.resolvePlan();
    this.plan = plan;

    log.info(
      { shardCount: plan.shardCount, maxConcurrency: plan.maxConcurrency, shardIds: plan.shardIds },
      `Starting ${plan.shardIds.length} of ${plan.shardCount} shards`,
    );

    const errors: unknown[] = [];
    for (const shardId of plan.shardIds) {
      const shard = this.createShard(shardId, plan);
      this.shards.set(shardId, shard);
      try {
        await shard.connect();
      } catch (err) {
        log.error({ err, shardId }, `Shard ${shardId} failed to start`);
        errors.push(err);
      }
    }

    if (errors.length > 0 && errors.length === plan.shardIds.length) {
      await this.close();
      throw errors[0];
    }
  }

  /**
   * Replace a shard that has stopped, typically after a terminal failure.
   * @throws ShardStateError when the shard is still running.
   */
  async restartShard(shardId: number): Promise<void> {
    const current = this.shards.get(shardId);
    const plan = this.plan;
    if (!current || !plan) {
      throw new GatewayError(`Shard ${shardId} is not managed`);
    }
    if (current.state !== 'disconnected') {
      throw new ShardStateError(shardId, 'restart', current.state);
    }
    await current.close();

    const shard = this.createShard(shardId, plan);
    this.shards.set(shardId, shard);
    this._failures.delete(shardId);
    log.info({ shardId }, `Restarting shard ${shardId}`);
    await shard.connect();
  }

  /** Close every shard. */
  async close(): Promise<void> {
    const shards = [...this.shards.values()];
    this.shards.clear();
    await Promise.all(shards.map((shard) => shard.close()));
    log.info(`Closed ${shards.length} shards`);
  }

  getShard(shardId: number): Shard | undefined {
    return this.shards.get(shardId);
  }

  /** Shard responsible for a guild, when this process runs it. */
  shardForGuild(guildId: string): Shard | undefined {
    if (!this.plan) return undefined;
    return this.shards.get(shardIdForGuild(guildId, this.plan.shardCount));
  }

  /**
   * Send a payload through one shard.
   * @throws GatewayError when the shard is not managed here.
   */
  async send(shardId: number, payload: GatewaySendPayload): Promise<void> {
    const shard = this.shards.get(shardId);
    if (!shard) {
      throw new GatewayError(`Shard ${shardId} is not managed`);
    }
    await shard.send(payload);
  }

  status(): ShardStatus[] {
    return [...this.shards.values()].map((shard) => shard.status()).sort((a, b) => a.shardId - b.shardId);
  }

  private async resolvePlan(): Promise<ShardPlan> {
    let { shardCount, maxConcurrency, gatewayUrl } = this.options;

    if (shardCount === undefined || maxConcurrency === undefined || gatewayUrl === undefined) {
      const rest = this.options.rest ?? this.defaultRestClient();
      const info = await getGatewayBot(rest, new BotAuthentication(this.options.token));
      const limit = info.session_start_limit;
      log.info(
        { recommendedShards: info.shards, remaining: limit.remaining, total: limit.total, maxConcurrency: limit.max_concurrency },
        'Fetched gateway connection info',
      );
      shardCount ??= info.shards;
      maxConcurrency ??= limit.max_concurrency;
      gatewayUrl ??= info.url;
    }

    const count = shardCount;
    const shardIds = this.options.shardIds ?? Array.from({ length: count }, (_, i) => i);
    const outOfRange = shardIds.filter((id) => id < 0 || id >= count);
    if (outOfRange.length > 0) {
      throw new GatewayError(`Shard ids ${outOfRange.join(', ')} are out of range for ${count} shards`);
    }

    return { shardCount: count, maxConcurrency, gatewayUrl, shardIds };
  }

  private defaultRestClient(): RestClient {
    const { apiVersion } = this.options;
    return new RestClient(apiVersion === undefined ? {} : { apiVersion });
  }

  private createShard(shardId: number, plan: ShardPlan): Shard {
    const { options } = this;
    return new Shard({
      shardId,
      shardCount: plan.shardCount,
      token: options.token,
      intents: options.intents,
      gatewayUrl: plan.gatewayUrl,
      apiVersion: options.apiVersion,
      compress: options.compress,
      largeThreshold: options.largeThreshold,
      presence: options.presence,
      reconnect: options.reconnect,
      reconnectCheck: options.reconnectCheck,
      identifyThrottle: (id, signal) => this.identifyLimiter(id, plan.maxConcurrency).acquire({ signal }),
      transportFactory: options.transportFactory,
      random: options.random,
      sink: {
        onPayload: (id, payload) => this.sink.onPayload(id, payload),
        onLifecycle: (id, event) => this.onLifecycle(id, event),
      },
    });
  }

  private identifyLimiter(shardId: number, maxConcurrency: number): WindowLimiter {
    const bucket = shardId % maxConcurrency;
    let limiter = this.identifyLimiters.get(bucket);
    if (!limiter) {
      limiter = new WindowLimiter(1, this.options.identifyWindowMs ?? DEFAULT_IDENTIFY_WINDOW_MS);
      this.identifyLimiters.set(bucket, limiter);
    }
    return limiter;
  }

  private async onLifecycle(shardId: number, event: ShardLifecycleEvent): Promise<void> {
    if (event.type === 'disconnected' && !event.willReconnect && event.error) {
      this._failures.set(shardId, event.error);
      log.error({ shardId, err: event.error }, `Shard ${shardId} gave up`);
    }
    await this.sink.onLifecycle?.(shardId, event);
  }
}
