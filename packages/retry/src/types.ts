/**
 * Retry mechanism types and interfaces
 */

import type { ErrorMatcher } from '@retryable/errors';
import type { Logger } from '@retryable/logging';

/**
 * How the delay grows with the attempt number
 */
export enum BackoffStrategy {
  /** `baseDelay * attempt` */
  LINEAR = 'linear',
  /** `baseDelay * 2^(attempt - 1)` */
  EXPONENTIAL = 'exponential',
}

export type BackoffName = `${BackoffStrategy}`;

/**
 * Pauses the retry loop between attempts. Durations are in seconds.
 */
export interface Suspender {
  suspend(seconds: number): void | Promise<void>;
}

/**
 * A suspender that returns only after the pause is over, for synchronous callers
 */
export interface BlockingSuspender extends Suspender {
  suspend(seconds: number): void;
}

/**
 * Decides whether a matched error is retried, given the attempt that produced it
 */
export type RetryPredicate = (error: unknown, attempt: number) => boolean;

export type BeforeRetryHook = (attempt: number, error: unknown) => void;
export type RetryHook = (error: unknown, attempt: number, delaySeconds: number) => void;
export type SuccessHook<T> = (result: T, attempts: number) => void;
export type FailureHook = (error: unknown, attempts: number) => void;

/**
 * Caller-facing retry options. Every field is optional and overrides the
 * matching default on its own.
 */
export interface RetryOptions<T = unknown> {
  /** Total number of attempts, including the first. Values below 1 mean one attempt. */
  maxAttempts?: number;
  /** Errors that trigger a retry. Defaults to any `Error`. */
  on?: readonly ErrorMatcher[];
  /** Errors that are never retried, even when they match `on` */
  except?: readonly ErrorMatcher[];
  /** Extra condition a matched error must satisfy to be retried */
  retryIf?: RetryPredicate;
  /** Seed delay in seconds */
  baseDelay?: number;
  /** Upper bound for every computed delay, in seconds */
  maxDelay?: number;
  backoff?: BackoffStrategy | BackoffName;
  /** Scale each delay by a random factor in [0.5, 1.5) */
  jitter?: boolean;
  /** Called with the failed attempt number and its error right before suspending */
  beforeRetry?: BeforeRetryHook;
  onRetry?: RetryHook;
  onSuccess?: SuccessHook<T>;
  onFailure?: FailureHook;
  suspender?: Suspender;
  /** Uniform source in [0, 1) used for jitter */
  random?: () => number;
  logger?: Logger;
}

/**
 * Fully resolved, immutable configuration for one executor
 */
export interface RetryConfig<T = unknown> {
  readonly maxAttempts: number;
  readonly on: readonly ErrorMatcher[];
  readonly except: readonly ErrorMatcher[];
  readonly retryIf?: RetryPredicate;
  readonly baseDelay: number;
  readonly maxDelay?: number;
  readonly backoff: BackoffStrategy;
  readonly jitter: boolean;
  readonly beforeRetry?: BeforeRetryHook;
  readonly onRetry?: RetryHook;
  readonly onSuccess?: SuccessHook<T>;
  readonly onFailure?: FailureHook;
  readonly suspender?: Suspender;
  readonly random: () => number;
  readonly logger?: Logger;
}

/**
 * Record of one retry that took place
 */
export interface RetryAttempt {
  /** The attempt that failed (1-based) */
  attempt: number;
  /** Delay applied before the next attempt, in seconds */
  delay: number;
  /** Milliseconds elapsed since the first attempt started */
  elapsedMs: number;
  /** The error that triggered this retry */
  error: unknown;
}

export type RetryResult<T> =
  | {
      success: true;
      data: T;
      totalAttempts: number;
      totalTimeMs: number;
      attempts: RetryAttempt[];
    }
  | {
      success: false;
      error: unknown;
      totalAttempts: number;
      totalTimeMs: number;
      attempts: RetryAttempt[];
    };
