/**
 * Retry execution engine
 */

import { RetryConfigurationError, extractErrorInfo, matchesAny } from '@retryable/errors';
import type { Logger } from '@retryable/logging';

import { computeDelay } from './calculator.js';
import { resolveRetryConfig } from './defaults.js';
import { blockingSuspender, isPromiseLike, timerSuspender } from './suspender.js';
import type {
  BlockingSuspender,
  RetryAttempt,
  RetryConfig,
  RetryOptions,
  RetryResult,
  Suspender,
} from './types.js';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

interface RunSummary<T> {
  outcome: Outcome<T>;
  totalAttempts: number;
  startedAt: number;
}

type FailureReason = 'excluded' | 'unmatched' | 'exhausted' | 'rejected';

/**
 * Options for synchronous work; the suspender must block instead of returning a promise.
 * A suspender that returns a promise anyway is rejected at the first retry.
 */
export type SyncRetryOptions<T = unknown> = Omit<RetryOptions<T>, 'suspender'> & {
  suspender?: BlockingSuspender;
};

/**
 * Retry decisions shared by the async and blocking executors. The executor
 * holds only its resolved configuration; attempt state lives in each call.
 */
abstract class BaseRetryExecutor<T> {
  readonly config: RetryConfig<T>;
  protected readonly logger: Logger | undefined;

  constructor(options: RetryOptions<T>) {
    this.config = resolveRetryConfig(options);
    this.logger = this.config.logger?.child('retry');
  }

  /**
   * Why a failed attempt ends the call, or undefined when it should be retried
   */
  protected terminalReason(error: unknown, attempt: number): FailureReason | undefined {
    const { config } = this;

    if (matchesAny(error, config.except)) {
      return 'excluded';
    }
    if (!matchesAny(error, config.on)) {
      return 'unmatched';
    }
    if (attempt >= config.maxAttempts) {
      return 'exhausted';
    }
    if (config.retryIf && !config.retryIf(error, attempt)) {
      return 'rejected';
    }
    return undefined;
  }

  /**
   * Run the retry hooks for a failed attempt and return the delay before the next one
   */
  protected prepareRetry(
    error: unknown,
    attempt: number,
    startedAt: number,
    record: RetryAttempt[]
  ): number {
    const { config } = this;

    config.beforeRetry?.(attempt, error);
    const delay = computeDelay(attempt, config, config.random);

    this.logger?.debug('Attempt failed, retrying', {
      attempt,
      maxAttempts: config.maxAttempts,
      delay,
      error: extractErrorInfo(error),
    });
    config.onRetry?.(error, attempt, delay);

    record.push({ attempt, delay, elapsedMs: Date.now() - startedAt, error });
    return delay;
  }

  protected recordFailure(error: unknown, attempt: number, reason: FailureReason): void {
    if (reason === 'exhausted') {
      this.logger?.warn('Retry attempts exhausted', {
        attempts: attempt,
        error: extractErrorInfo(error),
      });
    } else {
      this.logger?.debug('Error is not retried', {
        attempt,
        reason,
        error: extractErrorInfo(error),
      });
    }

    this.config.onFailure?.(error, attempt);
  }

  protected recordSuccess(result: T, attempt: number): void {
    if (attempt > 1) {
      this.logger?.debug('Operation succeeded after retries', { attempts: attempt });
    }
    this.config.onSuccess?.(result, attempt);
  }

  protected toResult(summary: RunSummary<T>, record: RetryAttempt[]): RetryResult<T> {
    const base = {
      totalAttempts: summary.totalAttempts,
      totalTimeMs: Date.now() - summary.startedAt,
      attempts: record,
    };

    return summary.outcome.ok
      ? { success: true, data: summary.outcome.value, ...base }
      : { success: false, error: summary.outcome.error, ...base };
  }
}

/**
 * Execute asynchronous (or synchronous) work with retry logic, suspending
 * cooperatively between attempts
 */
export class RetryExecutor<T> extends BaseRetryExecutor<T> {
  private readonly suspender: Suspender;

  constructor(options: RetryOptions<T> = {}) {
    super(options);
    this.suspender = this.config.suspender ?? timerSuspender;
  }

  /**
   * Run `work` until it succeeds or fails terminally. The original error is
   * rethrown unchanged.
   */
  async execute(work: () => T | PromiseLike<T>): Promise<T> {
    const { outcome } = await this.run(work, []);

    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.error;
  }

  /**
   * Like `execute`, but reports the outcome and every retry instead of throwing
   * the work's error
   */
  async executeWithResult(work: () => T | PromiseLike<T>): Promise<RetryResult<T>> {
    const record: RetryAttempt[] = [];
    const summary = await this.run(work, record);
    return this.toResult(summary, record);
  }

  private async run(
    work: () => T | PromiseLike<T>,
    record: RetryAttempt[]
  ): Promise<RunSummary<T>> {
    const startedAt = Date.now();
    let attempt = 0;

    for (;;) {
      attempt++;
      const outcome = await settle(work);

      if (outcome.ok) {
        this.recordSuccess(outcome.value, attempt);
        return { outcome, totalAttempts: attempt, startedAt };
      }

      const reason = this.terminalReason(outcome.error, attempt);
      if (reason) {
        this.recordFailure(outcome.error, attempt, reason);
        return { outcome, totalAttempts: attempt, startedAt };
      }

      const delay = this.prepareRetry(outcome.error, attempt, startedAt, record);
      await this.suspender.suspend(delay);
    }
  }
}

/**
 * Execute synchronous work with retry logic, blocking the calling thread between attempts.
 * Work that returns a promise throws a TypeError; use RetryExecutor for it.
 */
export class SyncRetryExecutor<T> extends BaseRetryExecutor<T> {
  private readonly suspender: BlockingSuspender;

  constructor(options: SyncRetryOptions<T> = {}) {
    super(options);
    this.suspender = options.suspender ?? blockingSuspender;
  }

  execute(work: () => T): T {
    const { outcome } = this.run(work, []);

    if (outcome.ok) {
      return outcome.value;
    }
    throw outcome.error;
  }

  executeWithResult(work: () => T): RetryResult<T> {
    const record: RetryAttempt[] = [];
    return this.toResult(this.run(work, record), record);
  }

  private run(work: () => T, record: RetryAttempt[]): RunSummary<T> {
    const startedAt = Date.now();
    let attempt = 0;

    for (;;) {
      attempt++;
      let outcome: Outcome<T>;
      try {
        outcome = { ok: true, value: work() };
      } catch (error) {
        outcome = { ok: false, error };
      }

      if (outcome.ok) {
        this.assertSynchronous(outcome.value);
        this.recordSuccess(outcome.value, attempt);
        return { outcome, totalAttempts: attempt, startedAt };
      }

      const reason = this.terminalReason(outcome.error, attempt);
      if (reason) {
        this.recordFailure(outcome.error, attempt, reason);
        return { outcome, totalAttempts: attempt, startedAt };
      }

      const delay = this.prepareRetry(outcome.error, attempt, startedAt, record);
      const pending: unknown = this.suspender.suspend(delay);
      if (isPromiseLike(pending)) {
        throw new RetryConfigurationError('Suspender cannot be used for synchronous work', [
          'suspend() returned a promise instead of blocking',
        ]);
      }
    }
  }

  private assertSynchronous(value: T): void {
    if (!isPromiseLike(value)) {
      return;
    }

    // Observe a later rejection so it is not reported as unhandled
    void value.then(undefined, (error: unknown) => {
      this.logger?.warn('Asynchronous work failed outside the retry loop', {
        error: extractErrorInfo(error),
      });
    });
    throw new TypeError(
      'SyncRetryExecutor cannot retry work that returns a promise; use RetryExecutor or retry()'
    );
  }
}

/**
 * Invoke `work` once and capture its value or error, including synchronous throws
 */
function settle<T>(work: () => T | PromiseLike<T>): Promise<Outcome<T>> {
  return new Promise<T>(resolve => resolve(work())).then(
    (value): Outcome<T> => ({ ok: true, value }),
    (error: unknown): Outcome<T> => ({ ok: false, error })
  );
}

/**
 * Run `work` with retries and return its result, or rethrow its last error
 */
export function retry<T>(
  work: () => T | PromiseLike<T>,
  options: RetryOptions<T> = {}
): Promise<T> {
  return new RetryExecutor<T>(options).execute(work);
}

/**
 * Blocking counterpart of `retry` for synchronous work
 */
export function retrySync<T>(work: () => T, options: SyncRetryOptions<T> = {}): T {
  return new SyncRetryExecutor<T>(options).execute(work);
}

/**
 * Utility functions for retry execution
 */
export const RetryUtils = {
  /**
   * Execute an operation and report the outcome as a RetryResult
   */
  executeWithRetry<T>(
    operation: () => T | PromiseLike<T>,
    options: RetryOptions<T> = {}
  ): Promise<RetryResult<T>> {
    return new RetryExecutor<T>(options).executeWithResult(operation);
  },

  /**
   * Wrap a function so that every call is retried
   */
  createRetryWrapper<A extends unknown[], R>(
    fn: (...args: A) => R | PromiseLike<R>,
    options: RetryOptions<R> = {}
  ): (...args: A) => Promise<R> {
    const executor = new RetryExecutor<R>(options);
    return (...args: A) => executor.execute(() => fn(...args));
  },
};
