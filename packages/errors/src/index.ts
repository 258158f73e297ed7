/**
 * Error classification and matching for retry decisions
 */

export {
  RetryClassification,
  ErrorCategory,
  ClassifiedError,
  type ErrorMetadata,
  type ClassifiedErrorOptions,
} from './types.js';

export { RetryConfigurationError, NetworkError, ExternalServiceError } from './domain.js';

export {
  type ErrorClass,
  type ErrorPredicate,
  type ErrorMatcher,
  isErrorClass,
  isStandardError,
  matchesError,
  matchesAny,
  isRetryableError,
  looksLikeNetworkError,
  extractErrorInfo,
} from './utils.js';
