/**
 * Retry policy configuration: zod schemas, YAML files and environment variables
 */

export { ConfigManager, ConfigValidationError, type ConfigOptions } from './manager.js';
export { ConfigUtils, TIME, type TimeUnit, type EnvSource } from './utils.js';
export {
  BACKOFF_NAMES,
  RetryPolicySchema,
  RetryPolicyEnvSchema,
  LoggingConfigSchema,
  RetryConfigFileSchema,
  type RetryPolicy,
  type RetryPolicyEnv,
  type LoggingConfig,
  type RetryConfigFile,
} from './schemas.js';
export {
  toRetryOptions,
  policyFromEnv,
  RetryPolicyRegistry,
  loadRetryPolicies,
} from './policies.js';
