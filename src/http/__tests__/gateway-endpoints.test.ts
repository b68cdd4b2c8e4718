import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { RestClient } from '../rest-client.js';
import { BotAuthentication } from '../authentication.js';
import { getGateway, getGatewayBot } from '../gateway-endpoints.js';

describe('gateway endpoints', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('fetches the gateway url without authentication', async () => {
    fetchMock.mockImplementation(async () => Response.json({ url: 'wss://gateway.test' }));
    const client = new RestClient();

    const info = await getGateway(client);

    expect(info).toEqual({ url: 'wss://gateway.test' });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://discord.com/api/v10/gateway');
    expect(init?.headers).not.toHaveProperty('Authorization');
    expect(client.storageFor().global.remaining).toBe(50);
  });

  it('fetches and validates the bot gateway info', async () => {
    fetchMock.mockImplementation(async () =>
      Response.json({
        url: 'wss://gateway.test',
        shards: 4,
        session_start_limit: { total: 1000, remaining: 998, reset_after: 3600, max_concurrency: 2 },
      }),
    );
    const client = new RestClient();

    const info = await getGatewayBot(client, new BotAuthentication('test-token'));

    expect(info.shards).toBe(4);
    expect(info.session_start_limit.max_concurrency).toBe(2);
    expect(fetchMock.mock.calls[0]?.[1]).toMatchObject({ headers: { Authorization: 'Bot test-token' } });
  });

  it('rejects a malformed payload', async () => {
    fetchMock.mockImplementation(async () => Response.json({ url: 'wss://gateway.test' }));
    const client = new RestClient();

    await expect(getGatewayBot(client, new BotAuthentication('test-token'))).rejects.toThrow();
  });
});
