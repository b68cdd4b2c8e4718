/**
 * FIFO mutual exclusion on top of @sapphire/async-queue, with abort support
 * that never leaves the lock held by a cancelled waiter.
 */

import { AsyncQueue } from '@sapphire/async-queue';

export class FifoMutex {
  private readonly queue = new AsyncQueue();

  /** Number of callers holding or waiting for the lock. */
  get pending(): number {
    return this.queue.remaining;
  }

  /**
   * Wait for the lock in arrival order.
   * @throws the signal's reason when aborted before the lock was granted.
   */
  async lock(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    try {
      await this.queue.wait({ signal });
    } catch (err) {
      if (signal?.aborted) throw signal.reason;
      throw err;
    }
  }

  unlock(): void {
    this.queue.shift();
  }

  /** Run `work` while holding the lock. */
  async run<T>(work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.lock(signal);
    try {
      return await work();
    } finally {
      this.unlock();
    }
  }
}
