/**
 * Conditional retry logic based on error types and conditions
 */

import {
  ClassifiedError,
  ErrorCategory,
  type ErrorMatcher,
  isRetryableError,
  looksLikeNetworkError,
  matchesAny,
} from '@retryable/errors';

import type { RetryPredicate } from './types.js';

/**
 * Pre-built retry conditions, usable as `retryIf`
 */
export class RetryConditions {
  /**
   * Retry only network-related errors
   */
  static networkErrors(): RetryPredicate {
    return (error: unknown) =>
      error instanceof ClassifiedError
        ? error.metadata.category === ErrorCategory.NETWORK
        : looksLikeNetworkError(error);
  }

  /**
   * Retry external service errors carrying one of the given HTTP status codes
   */
  static statusCodes(
    retryableStatusCodes: readonly number[] = [429, 502, 503, 504]
  ): RetryPredicate {
    return (error: unknown) => {
      if (!(error instanceof ClassifiedError)) {
        return false;
      }

      const statusCode = error.metadata.data?.['statusCode'];
      return typeof statusCode === 'number' && retryableStatusCodes.includes(statusCode);
    };
  }

  /**
   * Retry based on the error's retry classification
   */
  static retryableClassification(): RetryPredicate {
    return (error: unknown) => isRetryableError(error);
  }

  /**
   * Retry only for specific error codes (`error.code`)
   */
  static errorCodes(retryableCodes: readonly string[]): RetryPredicate {
    return (error: unknown) => {
      if (error instanceof Error && 'code' in error) {
        return retryableCodes.includes(String(error.code));
      }

      return false;
    };
  }

  /**
   * Retry only errors matching the given classes or predicates
   */
  static matching(...matchers: ErrorMatcher[]): RetryPredicate {
    return (error: unknown) => matchesAny(error, matchers);
  }

  /**
   * Stop retrying once `attempt` reaches the limit, independent of `maxAttempts`
   */
  static maxAttempts(maxAttempts: number): RetryPredicate {
    return (_error: unknown, attempt: number) => attempt < maxAttempts;
  }

  static and(...conditions: RetryPredicate[]): RetryPredicate {
    return (error: unknown, attempt: number) =>
      conditions.every(condition => condition(error, attempt));
  }

  static or(...conditions: RetryPredicate[]): RetryPredicate {
    return (error: unknown, attempt: number) =>
      conditions.some(condition => condition(error, attempt));
  }

  static not(condition: RetryPredicate): RetryPredicate {
    return (error: unknown, attempt: number) => !condition(error, attempt);
  }
}
