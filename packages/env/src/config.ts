import { LOG_LEVELS } from '@txcheck/logger';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { ConfigError } from './errors.js';

export const DEFAULT_API_URL = 'https://prism-api.caudena.com';

const envSchema = z.object({
  CAUDENA_API_URL: z.string().url().default(DEFAULT_API_URL),
  CAUDENA_RETRIES: z.coerce.number().int().positive().default(3),
  CAUDENA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  // Other tools set NODE_ENV too; anything unrecognised runs as production.
  NODE_ENV: z.enum(['development', 'production', 'test']).catch('production'),
  TXCHECK_LOG_FILE: z.string().optional(),
  TXCHECK_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface AppConfig {
  apiUrl: string;
  /** JSON-lines log file, written in addition to stderr. */
  logFile: string | undefined;
  logLevel: EnvConfig['TXCHECK_LOG_LEVEL'];
  nodeEnv: EnvConfig['NODE_ENV'];
  retries: number;
  timeoutMs: number;
}

/**
 * Validate the environment. Blank values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined>): Result<AppConfig, ConfigError> {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = envSchema.safeParse(present);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    return err(new ConfigError(`Environment validation failed:\n${errors}`));
  }

  const parsed = result.data;
  return ok({
    apiUrl: parsed.CAUDENA_API_URL,
    logFile: parsed.TXCHECK_LOG_FILE,
    logLevel: parsed.TXCHECK_LOG_LEVEL,
    nodeEnv: parsed.NODE_ENV,
    retries: parsed.CAUDENA_RETRIES,
    timeoutMs: parsed.CAUDENA_TIMEOUT_MS,
  });
}
