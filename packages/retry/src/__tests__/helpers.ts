import type { BlockingSuspender, Suspender } from '../index.js';

export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Suspender that records requested delays and returns immediately
 */
export function recordingSuspender(): BlockingSuspender & { delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    suspend(seconds: number): void {
      delays.push(seconds);
    },
  };
}

/**
 * Suspender that records delays and yields to other pending tasks before resuming
 */
export function yieldingSuspender(): Suspender & { delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    async suspend(seconds: number): Promise<void> {
      delays.push(seconds);
      await new Promise<void>(resolve => setImmediate(resolve));
    },
  };
}

/**
 * Work that fails with the given errors in order, then returns `value`
 */
export function flakyWork<T>(errors: unknown[], value: T): { work: () => T; calls: () => number } {
  let count = 0;
  return {
    work: () => {
      const error = errors[count];
      count++;
      if (count <= errors.length) {
        throw error;
      }
      return value;
    },
    calls: () => count,
  };
}
