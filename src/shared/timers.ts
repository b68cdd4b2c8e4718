/**
 * The one suspension primitive shared by rate-limit waits, heartbeats and
 * reconnect backoff, so every wait is cancelled the same way.
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Suspend for `ms` milliseconds. Rejects with the signal's reason when aborted.
 * Non-positive durations still yield once so callers stay cooperative.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  signal?.throwIfAborted();
  await delay(Math.max(0, ms), undefined, { signal });
}

/**
 * Suspend until `getDeadline()` (ms epoch) has passed. The deadline is re-read
 * after every wake, so an update made while waiting is honoured.
 */
export async function sleepUntil(
  getDeadline: () => number | undefined,
  signal?: AbortSignal,
): Promise<void> {
  for (;;) {
    const deadline = getDeadline();
    if (deadline === undefined) return;
    const remainingMs = deadline - Date.now();
    if (remainingMs <= 0) return;
    await sleep(remainingMs, signal);
  }
}
