import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { getLogger } from '@txcheck/logger';
import { parse } from 'dotenv';
import { err, ok, type Result } from 'neverthrow';

import { ConfigError } from './errors.js';

const logger = getLogger('env-files');

export const DEFAULT_ENV_FILES = ['.env', '.env.local'] as const;

export interface EnvFile {
  path: string;
  vars: Record<string, string>;
}

/**
 * Candidate files in lookup order: the explicit file first, then the
 * defaults relative to `cwd`.
 */
export function envFileCandidates(cwd: string, explicitPath?: string): string[] {
  const defaults = DEFAULT_ENV_FILES.map((name) => path.resolve(cwd, name));
  return explicitPath ? [path.resolve(cwd, explicitPath), ...defaults] : defaults;
}

const COLON_PAIR = /^(\s*(?:export\s+)?[A-Za-z_][\w.-]*)\s*:\s*(.*)$/;

/**
 * Rewrite `KEY:value` lines that carry no `=` to `KEY=value`. dotenv only
 * understands the colon form when a space follows it.
 */
export function normalizeColonPairs(content: string): string {
  return content
    .split(/\r?\n/)
    .map((line) => {
      if (line.includes('=') || line.trimStart().startsWith('#')) return line;
      const match = COLON_PAIR.exec(line);
      return match ? `${match[1] ?? ''}=${match[2] ?? ''}` : line;
    })
    .join('\n');
}

/**
 * Read and parse one env file. `KEY=value`, `KEY:value`, `export KEY=value`,
 * quoted values and comments are understood.
 */
export function readEnvFile(filePath: string): Result<Record<string, string>, ConfigError> {
  try {
    return ok(parse(normalizeColonPairs(readFileSync(filePath, 'utf8'))));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ConfigError(`Failed to read ${filePath}: ${reason}`));
  }
}

/**
 * Return the first candidate that exists and defines at least one variable.
 * A missing explicit file is an error; unreadable files are skipped with a warning.
 */
export function discoverEnvFile(cwd: string, explicitPath?: string): Result<EnvFile | undefined, ConfigError> {
  if (explicitPath && !existsSync(path.resolve(cwd, explicitPath))) {
    return err(new ConfigError(`Env file not found: ${explicitPath}`));
  }

  for (const candidate of envFileCandidates(cwd, explicitPath)) {
    if (!existsSync(candidate)) continue;

    const result = readEnvFile(candidate);
    if (result.isErr()) {
      logger.warn(result.error.message);
      continue;
    }

    if (Object.keys(result.value).length > 0) {
      logger.debug(`Loaded ${Object.keys(result.value).length} variables from ${candidate}`);
      return ok({ path: candidate, vars: result.value });
    }
  }

  return ok(undefined);
}
