import { describe, it, expect } from 'vitest';
import { RateLimitStorage } from '../storage.js';

function route(routeKey: string, majorParams: string = '') {
  return { routeKey, majorParams };
}

describe('RateLimitStorage', () => {
  it('returns the same bucket for the same route class', () => {
    const storage = new RateLimitStorage(50);
    const a = storage.getBucket(route('GET /channels/{channel_id}', '1'));
    const b = storage.getBucket(route('GET /channels/{channel_id}', '1'));
    expect(a).toBe(b);
  });

  it('separates buckets by major parameters', () => {
    const storage = new RateLimitStorage(50);
    const a = storage.getBucket(route('GET /channels/{channel_id}', '1'));
    const b = storage.getBucket(route('GET /channels/{channel_id}', '2'));
    expect(a).not.toBe(b);
    expect(a.metadata).not.toBe(b.metadata);
  });

  it('moves a route onto its hashed bucket once discovered', () => {
    const storage = new RateLimitStorage(50);
    const r = route('GET /channels/{channel_id}/messages', '1');
    const placeholder = storage.getBucket(r);

    const serving = storage.discoverHash(r, 'abc123', placeholder);

    expect(serving).toBe(placeholder);
    expect(storage.hashFor(r.routeKey)).toBe('abc123');
    expect(storage.getBucket(r)).toBe(placeholder);
  });

  it('shares one ledger entry between route classes with the same hash', () => {
    const storage = new RateLimitStorage(50);
    const get = route('GET /channels/{channel_id}/messages', '1');
    const post = route('POST /channels/{channel_id}/messages', '1');

    const getBucket = storage.getBucket(get);
    getBucket.update(4, 1000);
    storage.discoverHash(get, 'shared', getBucket);

    const postPlaceholder = storage.getBucket(post);
    const serving = storage.discoverHash(post, 'shared', postPlaceholder);

    expect(serving).toBe(getBucket);
    expect(storage.getBucket(post)).toBe(getBucket);
    expect(storage.getBucket(post).metadata).toBe(getBucket.metadata);
  });

  it('lets a used placeholder replace an unused hashed bucket', () => {
    const storage = new RateLimitStorage(50);
    const first = route('GET /guilds/{guild_id}', '9');
    const second = route('PATCH /guilds/{guild_id}', '9');

    const firstBucket = storage.getBucket(first);
    storage.discoverHash(first, 'guild', firstBucket);

    const secondBucket = storage.getBucket(second);
    secondBucket.update(0, 1000);
    const serving = storage.discoverHash(second, 'guild', secondBucket);

    expect(serving).toBe(secondBucket);
    expect(storage.getBucket(first)).toBe(secondBucket);
  });

  it('reports a snapshot of every bucket', () => {
    const storage = new RateLimitStorage(50);
    const bucket = storage.getBucket(route('GET /users/@me'));
    bucket.update(4, 1000, 5);

    const [snapshot] = storage.snapshot();
    expect(snapshot).toMatchObject({
      id: 'GET /users/@me:',
      limit: 5,
      remaining: 4,
      unlimited: false,
      dirty: true,
      pending: 0,
    });
  });
});
