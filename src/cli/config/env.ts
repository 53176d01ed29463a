/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * console host reads and validates them into a typed object.
 */

import { z } from 'zod';

/**
 * Node environment schema.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels used by the host).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** Minimum log level; defaults to debug in development, info elsewhere */
  LOG_LEVEL: LogLevelSchema.optional(),

  /** Console log format */
  LOG_FORMAT: LogFormatSchema.default('pretty'),

  /** Optional path of a JSON log file */
  LOG_FILE: z.string().optional(),

  /** Seed for reproducible dice; unset means Math.random */
  KNISTER_DICE_SEED: z.coerce.number().int().min(0).optional(),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 */
export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return process.env.JEST_WORKER_ID !== undefined;
}

export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
