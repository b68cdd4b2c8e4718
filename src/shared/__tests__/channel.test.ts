import { describe, it, expect } from 'vitest';
import { AsyncChannel } from '../channel.js';

describe('AsyncChannel', () => {
  it('returns buffered items in order', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);

    expect(channel.size).toBe(2);
    expect(await channel.next()).toBe(1);
    expect(await channel.next()).toBe(2);
    expect(channel.size).toBe(0);
  });

  it('hands a pushed item to the oldest waiter', async () => {
    const channel = new AsyncChannel<string>();
    const first = channel.next();
    const second = channel.next();

    channel.push('a');
    channel.push('b');

    expect(await first).toBe('a');
    expect(await second).toBe('b');
  });

  it('rejects with the abort reason and drops the waiter', async () => {
    const channel = new AsyncChannel<string>();
    const controller = new AbortController();
    const cancelled = channel.next(controller.signal);

    controller.abort(new Error('stop'));
    await expect(cancelled).rejects.toThrow('stop');

    channel.push('kept');
    expect(channel.size).toBe(1);
    expect(await channel.next()).toBe('kept');
  });

  it('rejects immediately for an aborted signal', async () => {
    const channel = new AsyncChannel<string>();
    channel.push('unused');

    await expect(channel.next(AbortSignal.abort(new Error('already')))).rejects.toThrow('already');
    expect(channel.size).toBe(1);
  });
});
