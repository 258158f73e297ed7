import { ClassifiedError } from './types.js';

/**
 * A class whose instances count as a match (by `instanceof`)
 */
export type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * A classification closure returning true for matching errors
 */
export type ErrorPredicate = (error: unknown) => boolean;

export type ErrorMatcher = ErrorClass | ErrorPredicate;

/**
 * Distinguish an error class from a predicate function
 */
export function isErrorClass(matcher: ErrorMatcher): matcher is ErrorClass {
  return matcher === Error || matcher.prototype instanceof Error;
}

/**
 * Check whether an error is an instance of the standard Error hierarchy
 */
export function isStandardError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Check a single matcher against an error
 */
export function matchesError(error: unknown, matcher: ErrorMatcher): boolean {
  if (isErrorClass(matcher)) {
    return error instanceof matcher;
  }
  return matcher(error);
}

/**
 * Check whether an error matches any of the given matchers, in order
 */
export function matchesAny(error: unknown, matchers: readonly ErrorMatcher[]): boolean {
  return matchers.some(matcher => matchesError(error, matcher));
}

const NETWORK_KEYWORDS = ['timeout', 'connection', 'network'] as const;

/**
 * Whether an error's name or message mentions a timeout, connection or network failure
 */
export function looksLikeNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const text = `${error.name} ${error.message}`.toLowerCase();
  return NETWORK_KEYWORDS.some(keyword => text.includes(keyword));
}

/**
 * Check if an error should be retried based on its classification, falling back to
 * network heuristics for unclassified errors
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ClassifiedError) {
    return error.isRetryable() || error.isConditionallyRetryable();
  }
  return looksLikeNetworkError(error);
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof ClassifiedError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}
