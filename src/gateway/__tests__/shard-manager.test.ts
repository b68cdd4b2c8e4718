import { describe, it, expect, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { ShardManager, shardIdForGuild, type ShardManagerOptions } from '../shard-manager.js';
import type { GatewayPayload } from '../codec.js';
import type { GatewaySink, ShardLifecycleEvent } from '../types.js';
import type { TransportFactory } from '../transport.js';
import { RestClient } from '../../http/rest-client.js';
import { GatewayError, InvalidTokenError, ReconnectCheckFailedError, ShardStateError } from '../../shared/errors.js';
import { FakeGateway, type FakeTransport } from './fake-transport.js';

// --- Test helpers ---

const GATEWAY_URL = 'wss://gateway.test';

const managers: ShardManager[] = [];

function until<T>(check: () => T): Promise<T> {
  return vi.waitFor(check, { timeout: 2000, interval: 5 });
}

function hello(transport: FakeTransport): void {
  transport.serverSend({ op: 10, d: { heartbeat_interval: 45_000 } });
}

interface Recorded {
  payloads: Array<{ shardId: number; payload: GatewayPayload }>;
  events: Array<{ shardId: number; event: ShardLifecycleEvent }>;
}

function createManager(gateway: FakeGateway, overrides: Partial<ShardManagerOptions> = {}) {
  const recorded: Recorded = { payloads: [], events: [] };
  const sink: GatewaySink = {
    onPayload: (shardId, payload) => {
      recorded.payloads.push({ shardId, payload });
    },
    onLifecycle: (shardId, event) => {
      recorded.events.push({ shardId, event });
    },
  };
  const manager = new ShardManager(
    {
      token: 'test-token',
      intents: 1,
      shardCount: 2,
      maxConcurrency: 1,
      gatewayUrl: GATEWAY_URL,
      identifyWindowMs: 100,
      reconnect: { baseDelayMs: 5, maxDelayMs: 20 },
      transportFactory: gateway.factory,
      random: () => 1,
      ...overrides,
    },
    sink,
  );
  managers.push(manager);
  return { manager, recorded };
}

/** Answer the next `count` connections with hello. */
async function serveHellos(gateway: FakeGateway, count: number): Promise<void> {
  for (let i = 0; i < count; i++) {
    hello(await gateway.nextConnection());
  }
}

/** Shard id and time of the identify sent on a transport. */
function identifyOf(transport: FakeTransport): { shardId: number; at: number } {
  const index = transport.sent.findIndex((payload) => payload.op === 2);
  const payload = transport.sent[index];
  const at = transport.sentAt[index];
  if (!payload || at === undefined) throw new Error(`no identify on ${transport.url}`);
  const { d } = payload;
  if (typeof d !== 'object' || d === null || !('shard' in d) || !Array.isArray(d.shard)) {
    throw new Error('identify without shard');
  }
  const [shardId] = d.shard;
  if (typeof shardId !== 'number') throw new Error('identify without shard id');
  return { shardId, at };
}

afterEach(async () => {
  await Promise.all(managers.splice(0).map((manager) => manager.close()));
  vi.unstubAllGlobals();
});

// --- Tests ---

describe('shardIdForGuild', () => {
  it('routes a guild by the timestamp bits of its id', () => {
    // 175928847299117063 >> 22 = 41944705796
    expect(shardIdForGuild('175928847299117063', 3)).toBe(41944705796 % 3);
    expect(shardIdForGuild('175928847299117063', 1)).toBe(0);
  });
});

describe('ShardManager', () => {
  describe('identify concurrency', () => {
    it('identifies one shard per bucket per window and runs buckets in parallel', async () => {
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway, { shardCount: 6, maxConcurrency: 2 });

      const serving = serveHellos(gateway, 6);
      await manager.connect();
      await serving;

      const identifies = await until(() => gateway.transports.map(identifyOf));
      expect(identifies.map((identify) => identify.shardId).sort()).toEqual([0, 1, 2, 3, 4, 5]);

      const at = new Map(identifies.map((identify) => [identify.shardId, identify.at]));
      const time = (shardId: number): number => at.get(shardId) ?? Number.NaN;

      // Same bucket: strictly one after another, a window apart.
      for (const [earlier, later] of [
        [0, 2],
        [2, 4],
        [1, 3],
        [3, 5],
      ] as const) {
        expect(time(later) - time(earlier)).toBeGreaterThanOrEqual(90);
      }
      // Different buckets: concurrently.
      expect(Math.abs(time(1) - time(0))).toBeLessThan(60);
      expect(Math.abs(time(5) - time(4))).toBeLessThan(60);
    });

    it('starts each shard only after the previous one is connecting', async () => {
      const gateway = new FakeGateway();
      const opened: number[] = [];
      const transportFactory: TransportFactory = async (url, signal) => {
        opened.push(manager.status().filter((status) => status.state === 'disconnected').length);
        return gateway.factory(url, signal);
      };
      const { manager } = createManager(gateway, { shardCount: 3, transportFactory });

      await manager.connect();

      // When each transport opens, only the shard opening it is still disconnected.
      expect(opened).toEqual([1, 1, 1]);
      expect(manager.status().map((status) => status.state)).toEqual(['connecting', 'connecting', 'connecting']);
    });
  });

  describe('discovery', () => {
    let fetchMock: Mock<typeof fetch>;

    it('asks the gateway/bot endpoint for what is not configured', async () => {
      fetchMock = vi.fn<typeof fetch>(
        async () =>
          new Response(
            JSON.stringify({
              url: 'wss://discovered.test',
              shards: 2,
              session_start_limit: { total: 1000, remaining: 998, reset_after: 1000, max_concurrency: 1 },
            }),
            { status: 200, headers: { 'content-type': 'application/json' } },
          ),
      );
      vi.stubGlobal('fetch', fetchMock);
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway, {
        shardCount: undefined,
        maxConcurrency: undefined,
        gatewayUrl: undefined,
        rest: new RestClient({ baseUrl: 'https://api.test' }),
      });

      await manager.connect();

      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe('https://api.test/v10/gateway/bot');
      expect(init).toMatchObject({ headers: { Authorization: 'Bot test-token' } });
      expect(manager.shardCount).toBe(2);
      expect(gateway.transports.map((transport) => transport.url)).toEqual([
        'wss://discovered.test/?v=10&encoding=json&compress=zlib-stream',
        'wss://discovered.test/?v=10&encoding=json&compress=zlib-stream',
      ]);
    });

    it('skips discovery when everything is configured', async () => {
      fetchMock = vi.fn<typeof fetch>();
      vi.stubGlobal('fetch', fetchMock);
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway);

      await manager.connect();

      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('shard subsets', () => {
    it('runs only the requested shards', async () => {
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway, { shardCount: 4, maxConcurrency: 4, shardIds: [1, 3] });

      const serving = serveHellos(gateway, 2);
      await manager.connect();
      await serving;

      const identifies = await until(() => gateway.transports.map(identifyOf));
      expect(identifies.map((identify) => identify.shardId)).toEqual([1, 3]);
      expect(manager.status().map((status) => status.shardId)).toEqual([1, 3]);
      expect(manager.getShard(0)).toBeUndefined();
    });

    it('rejects shard ids outside the shard count', async () => {
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway, { shardCount: 2, shardIds: [0, 2] });

      await expect(manager.connect()).rejects.toThrow(
        new GatewayError('Shard ids 2 are out of range for 2 shards'),
      );
      expect(gateway.transports).toHaveLength(0);
    });

    it('finds the shard for a guild', async () => {
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway, { shardCount: 3, maxConcurrency: 3 });

      await manager.connect();

      expect(manager.shardForGuild('175928847299117063')?.id).toBe(41944705796 % 3);
    });
  });

  describe('events', () => {
    it('tags payloads with the shard they came from', async () => {
      const gateway = new FakeGateway();
      const { manager, recorded } = createManager(gateway);

      await manager.connect();
      const second = gateway.transports[1];
      second?.serverSend({ op: 0, s: 1, t: 'GUILD_CREATE', d: { id: '1' } });

      await until(() => expect(recorded.payloads).toHaveLength(1));
      expect(recorded.payloads[0]).toEqual({
        shardId: 1,
        payload: { op: 0, s: 1, t: 'GUILD_CREATE', d: { id: '1' } },
      });
    });
  });

  describe('failures', () => {
    it('records a shard that gave up and restarts it on request', async () => {
      const gateway = new FakeGateway();
      const { manager, recorded } = createManager(gateway);

      await manager.connect();
      const [first] = gateway.transports;
      first?.serverClose(4004, 'Authentication failed.');

      await until(() => expect(manager.failures.get(0)).toBeInstanceOf(InvalidTokenError));
      expect(recorded.events.filter(({ event }) => event.type === 'disconnected')).toEqual([
        {
          shardId: 0,
          event: expect.objectContaining({ code: 4004, willReconnect: false }),
        },
      ]);
      expect(manager.getShard(1)?.state).toBe('connecting');

      await manager.restartShard(0);

      expect(manager.failures.has(0)).toBe(false);
      expect(gateway.transports).toHaveLength(3);
      expect(manager.getShard(0)?.state).toBe('connecting');
    });

    it('refuses to restart a shard that is still running', async () => {
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway);

      await manager.connect();

      await expect(manager.restartShard(1)).rejects.toBeInstanceOf(ShardStateError);
    });

    it('keeps the other shards running when one cannot start', async () => {
      const gateway = new FakeGateway();
      let calls = 0;
      const transportFactory: TransportFactory = async (url, signal) => {
        calls += 1;
        if (calls === 2) throw new Error('connect ECONNREFUSED');
        return gateway.factory(url, signal);
      };
      const { manager } = createManager(gateway, { transportFactory, reconnectCheck: () => false });

      await manager.connect();

      const [first] = gateway.transports;
      expect(first?.closedWith).toBeUndefined();
      expect(manager.status().map((status) => status.state)).toEqual(['connecting', 'disconnected']);
      expect(manager.failures.get(1)).toBeInstanceOf(ReconnectCheckFailedError);

      await manager.restartShard(1);

      expect(gateway.transports).toHaveLength(2);
      expect(manager.getShard(1)?.state).toBe('connecting');
      expect(manager.failures.size).toBe(0);
    });

    it('rejects and empties itself when no shard can start', async () => {
      const gateway = new FakeGateway();
      const transportFactory: TransportFactory = async () => {
        throw new Error('connect ECONNREFUSED');
      };
      const { manager } = createManager(gateway, { transportFactory, reconnectCheck: () => false });

      await expect(manager.connect()).rejects.toBeInstanceOf(ReconnectCheckFailedError);

      expect(manager.status()).toEqual([]);
    });

    it('lets a lifecycle handler restart a shard that gave up', async () => {
      const gateway = new FakeGateway();
      const restarts: Array<Promise<void>> = [];
      const manager: ShardManager = new ShardManager(
        {
          token: 'test-token',
          intents: 1,
          shardCount: 1,
          maxConcurrency: 1,
          gatewayUrl: GATEWAY_URL,
          identifyWindowMs: 100,
          reconnect: { baseDelayMs: 5, maxDelayMs: 20 },
          transportFactory: gateway.factory,
          random: () => 1,
        },
        {
          onPayload: () => {},
          onLifecycle: async (shardId, event) => {
            if (event.type === 'disconnected' && event.error instanceof InvalidTokenError && restarts.length === 0) {
              const restart = manager.restartShard(shardId);
              restarts.push(restart);
              await restart;
            }
          },
        },
      );
      managers.push(manager);

      await manager.connect();
      const first = await gateway.nextConnection();
      first.serverClose(4004, 'Authentication failed.');
      await gateway.nextConnection();

      await until(() => expect(restarts).toHaveLength(1));
      await restarts[0];
      expect(manager.getShard(0)?.state).toBe('connecting');
      expect(manager.failures.size).toBe(0);
    });
  });

  describe('close', () => {
    it('closes every shard', async () => {
      const gateway = new FakeGateway();
      const { manager } = createManager(gateway, { shardCount: 3, maxConcurrency: 3 });

      await manager.connect();
      const shards = [0, 1, 2].map((id) => manager.getShard(id));
      await manager.close();

      expect(shards.map((shard) => shard?.state)).toEqual(['disconnected', 'disconnected', 'disconnected']);
      expect(gateway.transports.map((transport) => transport.closedWith?.code)).toEqual([1000, 1000, 1000]);
      expect(manager.status()).toEqual([]);
    });
  });
});
