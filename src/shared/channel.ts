/**
 * Unbounded single-consumer queue with a suspendable, cancellable `next()`.
 * Used to turn event-emitter sockets into pull-based streams.
 */

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (reason: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class AsyncChannel<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  /** Items buffered and not yet taken. */
  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (!waiter) {
      this.items.push(item);
      return;
    }
    if (waiter.onAbort) {
      waiter.signal?.removeEventListener('abort', waiter.onAbort);
    }
    waiter.resolve(item);
  }

  /**
   * Take the next item, suspending until one is pushed.
   * @throws the signal's reason when aborted first.
   */
  next(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(signal.reason);
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }
}
