/**
 * Error classification types and the base error class for retry-aware errors
 */

/**
 * Error retry classification for automated retry logic
 */
export enum RetryClassification {
  /** Error should not be retried */
  NON_RETRYABLE = 'non_retryable',
  /** Error can be safely retried */
  RETRYABLE = 'retryable',
  /** Error may be retryable under certain conditions */
  CONDITIONALLY_RETRYABLE = 'conditionally_retryable',
}

/**
 * Error categories for domain-specific retry conditions
 */
export enum ErrorCategory {
  /** Network-related errors (timeouts, connection failures, etc.) */
  NETWORK = 'network',
  /** Configuration errors (invalid options, missing fields, etc.) */
  CONFIGURATION = 'configuration',
  /** External service errors (API failures, service unavailable, etc.) */
  EXTERNAL_SERVICE = 'external_service',
  /** Unknown or uncategorized errors */
  UNKNOWN = 'unknown',
}

export interface ErrorMetadata {
  category: ErrorCategory;
  retryClassification: RetryClassification;
  /** Original error that caused this error */
  cause?: Error;
  /** Additional error-specific data */
  data?: Record<string, unknown>;
}

export interface ClassifiedErrorOptions {
  code?: string;
  category?: ErrorCategory;
  retryClassification?: RetryClassification;
  cause?: Error;
  data?: Record<string, unknown>;
}

/**
 * Base error class carrying a code and retry classification
 */
export class ClassifiedError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(message: string, options: ClassifiedErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code ?? 'UNKNOWN_ERROR';

    this.metadata = {
      category: options.category ?? ErrorCategory.UNKNOWN,
      retryClassification: options.retryClassification ?? RetryClassification.NON_RETRYABLE,
      ...(options.cause && { cause: options.cause }),
      ...(options.data && { data: options.data }),
    };

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get formatted error information for logging
   */
  toLogFormat(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.metadata.category,
      retryClassification: this.metadata.retryClassification,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(this.metadata.cause && { cause: this.metadata.cause.message }),
    };
  }

  isRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.RETRYABLE;
  }

  isConditionallyRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.CONDITIONALLY_RETRYABLE;
  }
}
