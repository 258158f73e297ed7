/**
 * Tests for the blocking retry executor
 */

import { RetryConfigurationError } from '@retryable/errors';
import { LogLevel, LoggerFactory } from '@retryable/logging';
import { describe, it, expect, vi } from 'vitest';

import { SyncRetryExecutor, retrySync, timerSuspender } from '../index.js';

import { HttpError, flakyWork, recordingSuspender } from './helpers.js';

describe('SyncRetryExecutor', () => {
  it('should return synchronously once the work succeeds', () => {
    const suspender = recordingSuspender();
    const { work, calls } = flakyWork([new Error('a'), new Error('b')], 'sync result');

    const result = retrySync(work, { maxAttempts: 3, suspender });

    expect(result).toBe('sync result');
    expect(calls()).toBe(3);
    expect(suspender.delays).toEqual([1, 2]);
  });

  it('should rethrow the last error after the final attempt', () => {
    const errors = [new Error('1'), new Error('2'), new Error('3')];
    const { work, calls } = flakyWork(errors, 'never');

    expect(() => retrySync(work, { suspender: recordingSuspender() })).toThrow(errors[2]);
    expect(calls()).toBe(3);
  });

  it('should not retry an unmatched error', () => {
    const beforeRetry = vi.fn();
    const error = new RangeError('out of range');
    const { work, calls } = flakyWork([error], 'never');

    expect(() =>
      retrySync(work, { on: [HttpError], beforeRetry, suspender: recordingSuspender() })
    ).toThrow(error);
    expect(calls()).toBe(1);
    expect(beforeRetry).not.toHaveBeenCalled();
  });

  it('should use exponential backoff', () => {
    const suspender = recordingSuspender();
    const { work } = flakyWork([new Error(), new Error(), new Error()], 'ok');

    retrySync(work, { maxAttempts: 4, baseDelay: 1, backoff: 'exponential', suspender });

    expect(suspender.delays).toEqual([1, 2, 4]);
  });

  it('should block the calling thread with the default suspender', () => {
    const { work, calls } = flakyWork([new Error('transient')], 'ok');
    const started = performance.now();

    const result = retrySync(work, { baseDelay: 0.05 });

    expect(result).toBe('ok');
    expect(calls()).toBe(2);
    expect(performance.now() - started).toBeGreaterThanOrEqual(40);
  });

  it('should reject a suspender that returns a promise instead of blocking', () => {
    const { work, calls } = flakyWork([new Error('a'), new Error('b')], 'ok');
    let caught: unknown;

    try {
      retrySync(work, { baseDelay: 0, suspender: timerSuspender });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RetryConfigurationError);
    expect(caught).toMatchObject({
      message:
        'Suspender cannot be used for synchronous work: ' +
        'suspend() returned a promise instead of blocking',
    });
    expect(calls()).toBe(1);
  });

  it('should refuse work that returns a promise', async () => {
    const { logger, transport } = LoggerFactory.createMemoryLogger('test');
    let calls = 0;
    const work = async (): Promise<string> => {
      calls++;
      throw new Error('async failure');
    };

    expect(() => retrySync(work, { baseDelay: 0, logger })).toThrow(
      'SyncRetryExecutor cannot retry work that returns a promise; use RetryExecutor or retry()'
    );
    expect(calls).toBe(1);

    await new Promise<void>(resolve => setImmediate(resolve));
    expect(transport.messages(LogLevel.WARN)).toEqual([
      'Asynchronous work failed outside the retry loop',
    ]);
  });

  it('should refuse work that resolves successfully too', () => {
    const onSuccess = vi.fn();

    expect(() => retrySync(() => Promise.resolve('value'), { onSuccess })).toThrow(TypeError);
    expect(onSuccess).not.toHaveBeenCalled();
  });

  it('should report outcomes through executeWithResult', () => {
    const error = new Error('persistent');
    const { work } = flakyWork([error, error], 'never');
    const executor = new SyncRetryExecutor<string>({
      maxAttempts: 2,
      suspender: recordingSuspender(),
    });

    const result = executor.executeWithResult(work);

    expect(result.success).toBe(false);
    expect(result.totalAttempts).toBe(2);
    expect(result.attempts).toHaveLength(1);
  });
});
