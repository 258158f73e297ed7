/**
 * Delay calculation for retry attempts
 */

import { BackoffStrategy, type RetryConfig } from './types.js';

type DelayConfig = Pick<RetryConfig, 'baseDelay' | 'backoff' | 'jitter' | 'maxDelay'>;

/** Ceiling for any computed delay, in seconds; exponential growth saturates here */
export const MAX_DELAY_SECONDS = Number.MAX_SAFE_INTEGER;

/**
 * Delay before the attempt after `attempt`, without jitter or capping
 */
export function nominalDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelay' | 'backoff'>
): number {
  if (config.baseDelay === 0) {
    return 0;
  }

  let delay: number;
  switch (config.backoff) {
    case BackoffStrategy.EXPONENTIAL:
      delay = config.baseDelay * Math.pow(2, attempt - 1);
      break;

    case BackoffStrategy.LINEAR:
    default:
      delay = config.baseDelay * attempt;
  }

  return Math.min(delay, MAX_DELAY_SECONDS);
}

/**
 * Compute the delay, in seconds, to wait after failed attempt `attempt`.
 *
 * Jitter scales the backoff result by `0.5 + random()`; `maxDelay` caps the
 * final value.
 */
export function computeDelay(
  attempt: number,
  config: DelayConfig,
  random: () => number = Math.random
): number {
  let delay = nominalDelay(attempt, config);

  if (config.jitter) {
    delay *= 0.5 + random();
  }

  if (config.maxDelay !== undefined) {
    delay = Math.min(delay, config.maxDelay);
  }

  return Math.min(Math.max(0, delay), MAX_DELAY_SECONDS);
}

/**
 * Utility functions for delay calculations
 */
export const DelayUtils = {
  /**
   * Nominal (pre-jitter, capped) delays for every retry a config allows
   */
  schedule(config: DelayConfig & Pick<RetryConfig, 'maxAttempts'>): number[] {
    const delays: number[] = [];

    for (let attempt = 1; attempt < config.maxAttempts; attempt++) {
      const delay = nominalDelay(attempt, config);
      delays.push(config.maxDelay !== undefined ? Math.min(delay, config.maxDelay) : delay);
    }

    return delays;
  },

  /**
   * Upper bound on the total time spent suspended, in seconds
   */
  maxTotalDelay(config: DelayConfig & Pick<RetryConfig, 'maxAttempts'>): number {
    const factor = config.jitter ? 1.5 : 1;
    const cap = Math.min(config.maxDelay ?? MAX_DELAY_SECONDS, MAX_DELAY_SECONDS);
    return DelayUtils.schedule(config).reduce(
      (total, delay) => Math.min(total + Math.min(delay * factor, cap), MAX_DELAY_SECONDS),
      0
    );
  },
};
