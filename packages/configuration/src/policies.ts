/**
 * Named retry policies loaded from configuration files and the environment
 */

import { type Logger, LoggerFactory } from '@retryable/logging';
import { RetryExecutor, type RetryOptions, mergeRetryOptions } from '@retryable/retry';

import { ConfigManager, ConfigValidationError, type ConfigOptions } from './manager.js';
import {
  type RetryConfigFile,
  RetryConfigFileSchema,
  type RetryPolicyEnv,
  RetryPolicyEnvSchema,
} from './schemas.js';
import type { EnvSource } from './utils.js';

const ENV_KEYS = ['max_attempts', 'base_delay', 'backoff', 'jitter', 'max_delay'] as const;

/**
 * Map a file or env policy onto executor options. Absent fields stay unset so
 * the executor defaults apply to them.
 */
export function toRetryOptions(policy: RetryPolicyEnv): RetryOptions {
  return {
    maxAttempts: policy.max_attempts,
    baseDelay: policy.base_delay,
    maxDelay: policy.max_delay,
    backoff: policy.backoff,
    jitter: policy.jitter,
  };
}

/**
 * Read a policy from `<prefix>MAX_ATTEMPTS`, `<prefix>BASE_DELAY`, `<prefix>BACKOFF`,
 * `<prefix>JITTER` and `<prefix>MAX_DELAY`
 *
 * @throws ConfigValidationError when a variable is present but malformed
 */
export function policyFromEnv(env: EnvSource = process.env, prefix = 'RETRY_'): RetryOptions {
  const raw = Object.fromEntries(
    ENV_KEYS.map((key): [string, string | undefined] => [
      key,
      env[`${prefix}${key.toUpperCase()}`],
    ]).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = RetryPolicyEnvSchema.safeParse(raw);
  if (!result.success) {
    throw ConfigValidationError.fromZodError(
      `Invalid retry policy in environment (prefix ${prefix})`,
      result.error
    );
  }

  return toRetryOptions(result.data);
}

/**
 * Named policies with a shared logger
 */
export class RetryPolicyRegistry {
  private readonly policies: ReadonlyMap<string, RetryOptions>;

  constructor(
    policies: Record<string, RetryOptions>,
    readonly logger?: Logger
  ) {
    this.policies = new Map(Object.entries(policies));
  }

  static fromConfig(config: RetryConfigFile, logger?: Logger): RetryPolicyRegistry {
    const policies = Object.fromEntries(
      Object.entries(config.policies).map(([name, policy]) => [name, toRetryOptions(policy)])
    );
    return new RetryPolicyRegistry(
      policies,
      logger ?? LoggerFactory.fromConfig('retryable', config.logging)
    );
  }

  names(): string[] {
    return [...this.policies.keys()];
  }

  has(name: string): boolean {
    return this.policies.has(name);
  }

  /**
   * Options for a policy, with the registry logger attached
   *
   * @throws ConfigValidationError for an unknown policy name
   */
  get(name: string): RetryOptions {
    const policy = this.policies.get(name);
    if (!policy) {
      throw new ConfigValidationError(`Unknown retry policy: ${name}`, [
        `known policies: ${this.names().join(', ') || '(none)'}`,
      ]);
    }
    return mergeRetryOptions(policy, { logger: this.logger });
  }

  /**
   * Build an executor for a policy; `overrides` win field by field
   */
  executor<T>(name: string, overrides: RetryOptions<T> = {}): RetryExecutor<T> {
    return new RetryExecutor<T>(mergeRetryOptions<T>(this.get(name), overrides));
  }
}

/**
 * Load a YAML policy file into a registry
 */
export async function loadRetryPolicies(
  configPath: string,
  options: ConfigOptions = {}
): Promise<RetryPolicyRegistry> {
  const manager = new ConfigManager(configPath, RetryConfigFileSchema, options);
  const config = await manager.loadConfig();
  return RetryPolicyRegistry.fromConfig(config, options.logger);
}
