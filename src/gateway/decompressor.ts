/**
 * zlib-stream transport decompression.
 *
 * The gateway compresses the whole connection as one deflate stream and
 * sync-flushes after every payload, so a payload is complete once the
 * buffered compressed bytes end with the `00 00 ff ff` flush marker. The
 * same four bytes can also occur inside compressed data, so only a trailing
 * marker counts. A payload may span chunks; a chunk that ends on a flush
 * inflates to everything buffered since the previous one. One instance
 * serves one transport.
 */

import { createInflate, constants, type Inflate } from 'node:zlib';

export const ZLIB_SUFFIX = Buffer.from([0x00, 0x00, 0xff, 0xff]);

function endsWithSuffix(data: Buffer): boolean {
  return data.length >= ZLIB_SUFFIX.length && data.subarray(-ZLIB_SUFFIX.length).equals(ZLIB_SUFFIX);
}

export class Decompressor {
  private readonly inflate: Inflate;
  private pending: Buffer = Buffer.alloc(0);
  private output: Buffer[] = [];
  private failure?: Error;
  private queue: Promise<unknown> = Promise.resolve();

  constructor() {
    this.inflate = createInflate({ chunkSize: 64 * 1024, flush: constants.Z_SYNC_FLUSH });
    this.inflate.on('data', (chunk: Buffer) => {
      this.output.push(chunk);
    });
    this.inflate.on('error', (err: Error) => {
      this.failure = err;
    });
  }

  /** Compressed bytes received that do not yet end a payload. */
  get buffered(): number {
    return this.pending.length;
  }

  /**
   * Feed raw bytes from the socket.
   * @returns The payload completed by this chunk, or nothing while it is still partial.
   * @throws when the stream is corrupt; the instance is unusable afterwards.
   */
  feed(chunk: Uint8Array): Promise<Buffer[]> {
    const run = this.queue.then(() => this.process(chunk));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Release the zlib context. */
  destroy(): void {
    this.inflate.destroy();
    this.pending = Buffer.alloc(0);
    this.output = [];
  }

  private async process(chunk: Uint8Array): Promise<Buffer[]> {
    this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk]);

    if (!endsWithSuffix(this.pending)) {
      return [];
    }
    const segment = this.pending;
    this.pending = Buffer.alloc(0);
    return [await this.inflateSegment(segment)];
  }

  private inflateSegment(segment: Buffer): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      if (this.failure) {
        reject(this.failure);
        return;
      }
      const onError = (err: Error) => reject(err);
      this.inflate.once('error', onError);
      this.inflate.write(segment, (err) => {
        this.inflate.off('error', onError);
        const failure = err ?? this.failure;
        if (failure) {
          reject(failure);
          return;
        }
        // Output pushed while the chunk was processed may still be queued for the next tick.
        setImmediate(() => {
          const payload = Buffer.concat(this.output);
          this.output = [];
          resolve(payload);
        });
      });
    });
  }
}
