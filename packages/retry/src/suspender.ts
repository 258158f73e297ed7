/**
 * Suspension strategies used between attempts
 */

import type { BlockingSuspender, Suspender } from './types.js';

/** setTimeout cannot wait longer than a signed 32-bit number of milliseconds */
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Yields to the event loop for the duration, so other tasks keep running
 */
export const timerSuspender: Suspender = {
  async suspend(seconds: number): Promise<void> {
    let remainingMs = seconds * 1000;

    while (remainingMs > 0) {
      const chunk = Math.min(remainingMs, MAX_TIMER_MS);
      await new Promise<void>(resolve => setTimeout(resolve, chunk));
      remainingMs -= chunk;
    }
  },
};

/**
 * Blocks the calling thread for the duration. Other worker threads are not affected.
 */
export const blockingSuspender: BlockingSuspender = {
  suspend(seconds: number): void {
    if (!(seconds > 0)) {
      return;
    }

    const cell = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    Atomics.wait(cell, 0, 0, seconds * 1000);
  },
};

export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
