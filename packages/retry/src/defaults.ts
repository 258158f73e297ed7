/**
 * Default configuration and option resolution
 */

import { RetryConfigurationError } from '@retryable/errors';
import { z } from 'zod';

import { BackoffStrategy, type RetryConfig, type RetryOptions } from './types.js';

const RetryOptionsSchema = z.object({
  maxAttempts: z.number().finite().optional(),
  baseDelay: z.number().finite().optional(),
  maxDelay: z.number().finite().optional(),
  backoff: z.nativeEnum(BackoffStrategy).optional(),
  jitter: z.boolean().optional(),
});

/**
 * A fresh default configuration; never shared between calls
 */
export function defaultRetryConfig<T = unknown>(): RetryConfig<T> {
  return {
    maxAttempts: 3,
    on: [Error],
    except: [],
    baseDelay: 1.0,
    backoff: BackoffStrategy.LINEAR,
    jitter: false,
    random: Math.random,
  };
}

/**
 * Merge caller options over the defaults field by field, validate the scalar
 * fields and clamp them into range.
 *
 * @throws RetryConfigurationError when a numeric field is not a finite number,
 * `backoff` is unknown or `jitter` is not a boolean
 */
export function resolveRetryConfig<T = unknown>(options: RetryOptions<T> = {}): RetryConfig<T> {
  const parsed = RetryOptionsSchema.safeParse({
    maxAttempts: options.maxAttempts,
    baseDelay: options.baseDelay,
    maxDelay: options.maxDelay,
    backoff: options.backoff,
    jitter: options.jitter,
  });

  if (!parsed.success) {
    throw new RetryConfigurationError(
      'Invalid retry options',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const scalars = parsed.data;
  const defaults = defaultRetryConfig<T>();

  return Object.freeze({
    maxAttempts: Math.max(1, Math.floor(scalars.maxAttempts ?? defaults.maxAttempts)),
    on: Object.freeze([...(options.on ?? defaults.on)]),
    except: Object.freeze([...(options.except ?? defaults.except)]),
    baseDelay: Math.max(0, scalars.baseDelay ?? defaults.baseDelay),
    backoff: scalars.backoff ?? defaults.backoff,
    jitter: scalars.jitter ?? defaults.jitter,
    random: options.random ?? defaults.random,
    ...(scalars.maxDelay !== undefined && { maxDelay: Math.max(0, scalars.maxDelay) }),
    ...(options.retryIf && { retryIf: options.retryIf }),
    ...(options.beforeRetry && { beforeRetry: options.beforeRetry }),
    ...(options.onRetry && { onRetry: options.onRetry }),
    ...(options.onSuccess && { onSuccess: options.onSuccess }),
    ...(options.onFailure && { onFailure: options.onFailure }),
    ...(options.suspender && { suspender: options.suspender }),
    ...(options.logger && { logger: options.logger }),
  });
}

function withoutUndefined<T>(source: RetryOptions<T>): RetryOptions<T> {
  return Object.fromEntries(Object.entries(source).filter(([, value]) => value !== undefined));
}

/**
 * Merge option objects left to right; a field set to `undefined` does not
 * override an earlier value
 */
export function mergeRetryOptions<T = unknown>(
  ...sources: ReadonlyArray<RetryOptions<T> | undefined>
): RetryOptions<T> {
  return sources.reduce<RetryOptions<T>>(
    (merged, source) => (source ? { ...merged, ...withoutUndefined(source) } : merged),
    {}
  );
}
