/**
 * Tests for error matching and classification utilities
 */

import { describe, it, expect } from 'vitest';

import {
  ClassifiedError,
  ExternalServiceError,
  NetworkError,
  RetryClassification,
  extractErrorInfo,
  isErrorClass,
  isRetryableError,
  isStandardError,
  looksLikeNetworkError,
  matchesAny,
  matchesError,
} from '../index.js';

class QuotaError extends Error {}
class DailyQuotaError extends QuotaError {}

describe('Error Utils', () => {
  describe('isErrorClass', () => {
    it('should recognize Error and its subclasses', () => {
      expect(isErrorClass(Error)).toBe(true);
      expect(isErrorClass(TypeError)).toBe(true);
      expect(isErrorClass(DailyQuotaError)).toBe(true);
    });

    it('should treat plain functions as predicates', () => {
      expect(isErrorClass(() => true)).toBe(false);
      expect(isErrorClass(function named(error: unknown) {
        return error === null;
      })).toBe(false);
    });
  });

  describe('matchesError', () => {
    it('should match subclasses of a class matcher', () => {
      expect(matchesError(new DailyQuotaError(), QuotaError)).toBe(true);
      expect(matchesError(new QuotaError(), DailyQuotaError)).toBe(false);
      expect(matchesError('quota', QuotaError)).toBe(false);
    });

    it('should call predicate matchers with the error', () => {
      const isQuota = (error: unknown) => error instanceof Error && error.message === 'quota';

      expect(matchesError(new Error('quota'), isQuota)).toBe(true);
      expect(matchesError(new Error('other'), isQuota)).toBe(false);
    });
  });

  describe('matchesAny', () => {
    it('should match when any matcher accepts the error', () => {
      const matchers = [RangeError, (error: unknown) => error === 'stop'];

      expect(matchesAny(new RangeError('r'), matchers)).toBe(true);
      expect(matchesAny('stop', matchers)).toBe(true);
      expect(matchesAny(new TypeError('t'), matchers)).toBe(false);
    });

    it('should never match an empty list', () => {
      expect(matchesAny(new Error('any'), [])).toBe(false);
    });
  });

  it('should identify standard errors', () => {
    expect(isStandardError(new SyntaxError('s'))).toBe(true);
    expect(isStandardError({ message: 'not an error' })).toBe(false);
  });

  describe('looksLikeNetworkError', () => {
    it('should check the name and message of errors', () => {
      const aborted = new Error('request aborted');
      aborted.name = 'ConnectionError';

      expect(looksLikeNetworkError(new Error('Network unreachable'))).toBe(true);
      expect(looksLikeNetworkError(aborted)).toBe(true);
      expect(looksLikeNetworkError(new Error('permission denied'))).toBe(false);
    });

    it('should ignore values that are not errors', () => {
      expect(looksLikeNetworkError('connection reset')).toBe(false);
    });
  });

  describe('isRetryableError', () => {
    it('should follow the classification of classified errors', () => {
      expect(isRetryableError(new NetworkError('reset'))).toBe(true);
      expect(isRetryableError(new ExternalServiceError('busy'))).toBe(true);
      expect(isRetryableError(new ClassifiedError('bad input'))).toBe(false);
      expect(
        isRetryableError(
          new NetworkError('dns', { retryClassification: RetryClassification.NON_RETRYABLE })
        )
      ).toBe(false);
    });

    it('should fall back to message heuristics', () => {
      expect(isRetryableError(new Error('Request timeout'))).toBe(true);
      expect(isRetryableError(new Error('invalid token'))).toBe(false);
      expect(isRetryableError(undefined)).toBe(false);
    });
  });

  describe('extractErrorInfo', () => {
    it('should use the log format of classified errors', () => {
      const error = new ExternalServiceError('busy', { statusCode: 503 });

      expect(extractErrorInfo(error)).toEqual({
        name: 'ExternalServiceError',
        message: 'busy',
        code: 'EXTERNAL_SERVICE_ERROR',
        category: 'external_service',
        retryClassification: 'conditionally_retryable',
        data: { statusCode: 503 },
      });
    });

    it('should describe plain errors and thrown values', () => {
      expect(extractErrorInfo(new TypeError('bad type'))).toEqual({
        name: 'TypeError',
        message: 'bad type',
      });
      expect(extractErrorInfo(42)).toEqual({ name: 'UnknownError', message: '42' });
    });
  });
});
