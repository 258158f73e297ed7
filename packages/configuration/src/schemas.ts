/**
 * Schemas for retry policy files and environment variables
 */

import { z } from 'zod';

import { ConfigUtils } from './utils.js';

export const BACKOFF_NAMES = ['linear', 'exponential'] as const;

/**
 * One named retry policy as written in a configuration file
 */
export const RetryPolicySchema = z
  .object({
    /** Total attempts, including the first */
    max_attempts: z.coerce.number().int().default(3),
    /** Seed delay; seconds or a duration string */
    base_delay: ConfigUtils.durationTransformer().default(1),
    backoff: z.enum(BACKOFF_NAMES).default('linear'),
    jitter: ConfigUtils.booleanTransformer().default(false),
    /** Ceiling for every computed delay */
    max_delay: ConfigUtils.durationTransformer().optional(),
  })
  .strict();

/**
 * Policy fields read from environment variables; every field may be absent
 */
export const RetryPolicyEnvSchema = z.object({
  max_attempts: z.coerce.number().int().optional(),
  base_delay: ConfigUtils.durationTransformer().optional(),
  backoff: z.enum(BACKOFF_NAMES).optional(),
  jitter: ConfigUtils.booleanTransformer().optional(),
  max_delay: ConfigUtils.durationTransformer().optional(),
});

/**
 * Logging configuration schema
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']).default('INFO'),
  format: z.enum(['json', 'text']).default('text'),
});

/**
 * Top-level layout of a retry configuration file
 */
export const RetryConfigFileSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  policies: z.record(z.string(), RetryPolicySchema).default({}),
});

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type RetryPolicyEnv = z.infer<typeof RetryPolicyEnvSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type RetryConfigFile = z.infer<typeof RetryConfigFileSchema>;
