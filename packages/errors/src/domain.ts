/**
 * Domain-specific error classes
 */

import { ClassifiedError, ErrorCategory, RetryClassification } from './types.js';

/**
 * Raised when retry options cannot be resolved into a usable configuration
 */
export class RetryConfigurationError extends ClassifiedError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join(', ')}` : message, {
      code: 'RETRY_CONFIGURATION_ERROR',
      category: ErrorCategory.CONFIGURATION,
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...(issues.length > 0 && { data: { issues } }),
    });
    this.issues = issues;
  }
}

/**
 * Network-related errors (timeouts, connection failures, DNS issues, etc.)
 */
export class NetworkError extends ClassifiedError {
  constructor(
    message: string,
    options: {
      code?: string;
      cause?: Error;
      data?: Record<string, unknown>;
      retryClassification?: RetryClassification;
    } = {}
  ) {
    super(message, {
      code: options.code ?? 'NETWORK_ERROR',
      category: ErrorCategory.NETWORK,
      retryClassification: options.retryClassification ?? RetryClassification.RETRYABLE,
      ...(options.cause && { cause: options.cause }),
      ...(options.data && { data: options.data }),
    });
  }
}

/**
 * External service errors, optionally carrying the HTTP status code
 */
export class ExternalServiceError extends ClassifiedError {
  constructor(
    message: string,
    options: {
      code?: string;
      statusCode?: number;
      cause?: Error;
      retryClassification?: RetryClassification;
    } = {}
  ) {
    super(message, {
      code: options.code ?? 'EXTERNAL_SERVICE_ERROR',
      category: ErrorCategory.EXTERNAL_SERVICE,
      retryClassification:
        options.retryClassification ?? RetryClassification.CONDITIONALLY_RETRYABLE,
      ...(options.cause && { cause: options.cause }),
      ...(options.statusCode !== undefined && { data: { statusCode: options.statusCode } }),
    });
  }
}
