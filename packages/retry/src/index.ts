/**
 * Retry module - re-run a unit of work on recognized errors with linear or
 * exponential backoff, optional jitter and a pluggable suspension strategy
 */

export {
  BackoffStrategy,
  type BackoffName,
  type Suspender,
  type BlockingSuspender,
  type RetryPredicate,
  type BeforeRetryHook,
  type RetryHook,
  type SuccessHook,
  type FailureHook,
  type RetryOptions,
  type RetryConfig,
  type RetryAttempt,
  type RetryResult,
} from './types.js';

export { defaultRetryConfig, resolveRetryConfig, mergeRetryOptions } from './defaults.js';

export { computeDelay, nominalDelay, DelayUtils, MAX_DELAY_SECONDS } from './calculator.js';

export { timerSuspender, blockingSuspender, isPromiseLike } from './suspender.js';

export {
  RetryExecutor,
  SyncRetryExecutor,
  retry,
  retrySync,
  RetryUtils,
  type SyncRetryOptions,
} from './executor.js';

export { RetryConditions } from './conditional.js';
