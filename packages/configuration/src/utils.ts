/**
 * Configuration utilities for parsing and environment substitution
 */

import { z } from 'zod';

/**
 * Time units and their multipliers in seconds
 */
const TIME_UNITS = {
  ms: 0.001,
  s: 1,
  m: 60,
  h: 60 * 60,
} as const;

export type TimeUnit = keyof typeof TIME_UNITS;

const isTimeUnit = (unit: string): unit is TimeUnit => unit in TIME_UNITS;

/**
 * Readable time constants, in seconds
 */
export const TIME = {
  MILLISECOND: TIME_UNITS.ms,
  SECOND: TIME_UNITS.s,
  MINUTE: TIME_UNITS.m,
  HOUR: TIME_UNITS.h,
} as const;

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Configuration parsing and transformation utilities
 */
export class ConfigUtils {
  /**
   * Parse a duration into seconds
   * @param duration Seconds as a number or numeric string, or a string like "500ms", "2s", "1m30s"
   */
  static parseDuration(duration: string | number): number {
    if (typeof duration === 'number') {
      if (!Number.isFinite(duration) || duration < 0) {
        throw new Error(`Invalid duration value: ${duration}`);
      }
      return duration;
    }

    const durationStr = duration.trim().toLowerCase();

    if (/^\d+(?:\.\d+)?$/.test(durationStr)) {
      return parseFloat(durationStr);
    }

    if (!/^(?:\d+(?:\.\d+)?\s*[a-z]+\s*)+$/.test(durationStr)) {
      throw new Error(
        `Invalid duration format: ${duration}. Expected format like "500ms", "2s", "1m30s"`
      );
    }

    let totalSeconds = 0;
    const parts = durationStr.matchAll(/(\d+(?:\.\d+)?)\s*([a-z]+)/g);

    for (const [, valueStr = '', unit = ''] of parts) {
      if (!isTimeUnit(unit)) {
        const validUnits = Object.keys(TIME_UNITS).join(', ');
        throw new Error(`Invalid duration unit: ${unit}. Valid units: ${validUnits}`);
      }
      totalSeconds += parseFloat(valueStr) * TIME_UNITS[unit];
    }

    return totalSeconds;
  }

  /**
   * Parse a boolean written as a YAML/env string
   */
  static parseBoolean(value: string | boolean): boolean {
    if (typeof value === 'boolean') {
      return value;
    }

    switch (value.trim().toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
        return true;
      case 'false':
      case '0':
      case 'no':
        return false;
      default:
        throw new Error(`Invalid boolean value: ${value}`);
    }
  }

  /**
   * Substitute `${VAR}` and `${VAR:-default}` placeholders throughout a parsed document
   */
  static processEnvVars(value: unknown, env: EnvSource = process.env): unknown {
    if (typeof value === 'string') {
      return ConfigUtils.substituteEnvVars(value, env);
    }

    if (Array.isArray(value)) {
      return value.map(item => ConfigUtils.processEnvVars(item, env));
    }

    if (value !== null && typeof value === 'object') {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, ConfigUtils.processEnvVars(item, env)])
      );
    }

    return value;
  }

  /**
   * Substitute environment variables in a string
   */
  static substituteEnvVars(str: string, env: EnvSource = process.env): string {
    return str.replace(/\$\{([^}]+)\}/g, (_match, varExpr: string) => {
      const [varName = '', defaultValue] = varExpr.split(':-');
      const envValue = env[varName.trim()];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue.trim();
      }

      throw new Error(`Required environment variable not set: ${varName.trim()}`);
    });
  }

  /**
   * Zod schema accepting seconds or a duration string, producing seconds
   */
  static durationTransformer() {
    return z.union([z.number(), z.string()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseDuration(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }

  /**
   * Zod schema accepting a boolean or a boolean-like string
   */
  static booleanTransformer() {
    return z.union([z.boolean(), z.string()]).transform((value, ctx) => {
      try {
        return ConfigUtils.parseBoolean(value);
      } catch (error) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: error instanceof Error ? error.message : String(error),
        });
        return z.NEVER;
      }
    });
  }
}
