/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod and exports a frozen
 * config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { LogFormatSchema, LogLevelSchema, NodeEnvSchema, getEffectiveNodeEnv, parseEnv } from './env';

// Load .env into process.env before we read anything from it.
// Skipped in test mode so a developer .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env = envResult.data;

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  simulation: z.object({
    seed: z.number().int().min(0).optional(),
    invalidActionReward: z.number(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

const nodeEnv = getEffectiveNodeEnv(env);

const preliminaryConfig: AppConfig = {
  nodeEnv,
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  simulation: {
    seed: env.UTTT_SEED,
    invalidActionReward: env.UTTT_INVALID_ACTION_REWARD,
  },
};

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
