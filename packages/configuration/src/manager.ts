import { promises as fs } from 'fs';

import { ClassifiedError, ErrorCategory, RetryClassification } from '@retryable/errors';
import type { Logger } from '@retryable/logging';
import { load as yamlLoad } from 'js-yaml';
import type { z } from 'zod';

import { ConfigUtils, type EnvSource } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute `${VAR:-default}` placeholders */
  enableEnvSubstitution?: boolean;
  /** Variables used for substitution, defaults to `process.env` */
  env?: EnvSource;
}

/**
 * Configuration validation error with formatted issue details
 */
export class ConfigValidationError extends ClassifiedError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: Error) {
    super(message, {
      code: 'CONFIG_VALIDATION_ERROR',
      category: ErrorCategory.CONFIGURATION,
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...(cause && { cause }),
      ...(issues.length > 0 && { data: { issues } }),
    });
    this.issues = issues;
  }

  static fromZodError(message: string, error: z.ZodError): ConfigValidationError {
    return new ConfigValidationError(
      message,
      error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      error
    );
  }
}

/**
 * Loads a YAML configuration file and validates it against a zod schema
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger?.child('config');
  }

  /**
   * Load and validate the configuration file
   */
  async loadConfig(): Promise<T> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      this.logger?.error(`Failed to read configuration: ${this.configPath}`, error);
      throw new ConfigValidationError(
        `Configuration file not readable: ${this.configPath}`,
        [],
        error instanceof Error ? error : undefined
      );
    }

    let parsed: unknown;
    try {
      parsed = yamlLoad(content) ?? {};
      if (this.options.enableEnvSubstitution) {
        parsed = ConfigUtils.processEnvVars(parsed, this.options.env);
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(
        `Configuration could not be parsed: ${this.configPath}`,
        [reason],
        error instanceof Error ? error : undefined
      );
    }

    this.config = this.validateConfig(parsed);
    this.logger?.info(`Configuration loaded from: ${this.configPath}`);
    return this.config;
  }

  /**
   * Validate a configuration object without reading from disk
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config);

    if (!result.success) {
      const error = ConfigValidationError.fromZodError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
      this.logger?.error(`Validation errors: ${error.issues.join(', ')}`);
      throw error;
    }

    return result.data;
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new Error('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }
}
