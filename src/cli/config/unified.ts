/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  RawEnv,
  getEffectiveNodeEnv,
  isDevelopment,
  isTest,
  parseEnv,
} from './env';

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  dice: z.object({
    /** Undefined means dice come from Math.random */
    seed: z.number().int().min(0).optional(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Assemble the application config from already-validated environment values.
 */
export function buildConfig(env: RawEnv): AppConfig {
  const nodeEnv = getEffectiveNodeEnv(env);

  return ConfigSchema.parse({
    nodeEnv,
    isDevelopment: isDevelopment(nodeEnv),
    isTest: isTest(nodeEnv),
    app: {
      name: 'knister',
      version: env.npm_package_version?.trim() || '1.0.0',
    },
    logging: {
      level: env.LOG_LEVEL ?? 'info',
      format: env.LOG_FORMAT,
      file: env.LOG_FILE?.trim() || undefined,
    },
    dice: {
      seed: env.KNISTER_DICE_SEED,
    },
  });
}

// Load .env into process.env before we read anything from it. Skipped in
// test mode so that a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}

export const config: Readonly<AppConfig> = Object.freeze(buildConfig(envResult.data));
