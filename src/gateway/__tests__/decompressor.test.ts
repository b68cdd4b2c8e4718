import { describe, it, expect, afterEach } from 'vitest';
import { Decompressor, ZLIB_SUFFIX } from '../decompressor.js';
import { deflateFrames } from './fake-transport.js';

const HELLO = JSON.stringify({ op: 10, d: { heartbeat_interval: 41250 } });
const READY = JSON.stringify({ op: 0, s: 1, t: 'READY', d: { session_id: 'abc' } });

describe('Decompressor', () => {
  let decompressor: Decompressor;

  afterEach(() => {
    decompressor.destroy();
  });

  it('inflates a frame delivered in one chunk', async () => {
    decompressor = new Decompressor();
    const [frame] = await deflateFrames([HELLO]);

    expect(frame?.subarray(-4).equals(ZLIB_SUFFIX)).toBe(true);
    const payloads = await decompressor.feed(frame ?? Buffer.alloc(0));

    expect(payloads.map((p) => p.toString('utf8'))).toEqual([HELLO]);
    expect(decompressor.buffered).toBe(0);
  });

  it('buffers a frame split across chunks until the flush marker arrives', async () => {
    decompressor = new Decompressor();
    const [frame = Buffer.alloc(0)] = await deflateFrames([HELLO]);
    const cut = Math.floor(frame.length / 2);

    expect(await decompressor.feed(frame.subarray(0, cut))).toEqual([]);
    expect(decompressor.buffered).toBe(cut);

    const payloads = await decompressor.feed(frame.subarray(cut));
    expect(payloads.map((p) => p.toString('utf8'))).toEqual([HELLO]);
  });

  it('finds a flush marker split between two chunks', async () => {
    decompressor = new Decompressor();
    const [frame = Buffer.alloc(0)] = await deflateFrames([HELLO]);

    expect(await decompressor.feed(frame.subarray(0, frame.length - 2))).toEqual([]);
    const payloads = await decompressor.feed(frame.subarray(frame.length - 2));
    expect(payloads.map((p) => p.toString('utf8'))).toEqual([HELLO]);
  });

  it('only ends a payload at a trailing flush marker', async () => {
    decompressor = new Decompressor();
    const [first = Buffer.alloc(0), second = Buffer.alloc(0)] = await deflateFrames([HELLO, READY]);
    const head = Buffer.concat([first, second.subarray(0, 3)]);

    // The marker closing the first frame is now inside the buffered bytes.
    expect(await decompressor.feed(head)).toEqual([]);
    expect(decompressor.buffered).toBe(head.length);

    const payloads = await decompressor.feed(second.subarray(3));
    expect(payloads.map((p) => p.toString('utf8'))).toEqual([HELLO + READY]);
    expect(decompressor.buffered).toBe(0);
  });

  it('keeps one inflate context across frames', async () => {
    decompressor = new Decompressor();
    const [first = Buffer.alloc(0), second = Buffer.alloc(0)] = await deflateFrames([READY, READY]);

    // The second frame back-references the first and is smaller for it.
    expect(second.length).toBeLessThan(first.length);
    expect((await decompressor.feed(first)).map((p) => p.toString('utf8'))).toEqual([READY]);
    expect((await decompressor.feed(second)).map((p) => p.toString('utf8'))).toEqual([READY]);
  });

  it('serializes concurrent feeds', async () => {
    decompressor = new Decompressor();
    const [frame = Buffer.alloc(0)] = await deflateFrames([HELLO]);
    const cut = 5;

    const [a, b] = await Promise.all([decompressor.feed(frame.subarray(0, cut)), decompressor.feed(frame.subarray(cut))]);
    expect(a).toEqual([]);
    expect(b.map((p) => p.toString('utf8'))).toEqual([HELLO]);
  });

  it('rejects corrupt data', async () => {
    decompressor = new Decompressor();
    const garbage = Buffer.concat([Buffer.from('not a zlib stream'), ZLIB_SUFFIX]);

    await expect(decompressor.feed(garbage)).rejects.toThrow();
  });
});
