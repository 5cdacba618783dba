import { err, ok, type Result } from 'neverthrow';

import { MissingCredentialError } from './errors.js';

export interface CaudenaCredentials {
  kid: string;
  /** Base64-encoded signing secret. */
  secret: string;
}

/** Names accepted in env files for the key id, in priority order. */
export const KID_FILE_KEYS = ['CAUDENA_KID', 'id_caudena', 'KID', 'API_KID', 'CAUDENA_API_KID'] as const;

/** Names accepted in env files for the secret, in priority order. */
export const SECRET_FILE_KEYS = ['CAUDENA_SECRET', 'secret', 'SECRET', 'API_SECRET', 'CAUDENA_API_SECRET'] as const;

function firstValue(sources: (string | undefined)[]): string | undefined {
  for (const value of sources) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

/**
 * Process environment wins over file values; among file values the first
 * alias that is set wins.
 */
export function resolveCredentials(
  processEnv: Record<string, string | undefined>,
  fileVars: Record<string, string> = {}
): Result<CaudenaCredentials, MissingCredentialError> {
  const kid = firstValue([processEnv['CAUDENA_KID'], ...KID_FILE_KEYS.map((key) => fileVars[key])]);
  if (!kid) {
    return err(new MissingCredentialError('CAUDENA_KID'));
  }

  const secret = firstValue([processEnv['CAUDENA_SECRET'], ...SECRET_FILE_KEYS.map((key) => fileVars[key])]);
  if (!secret) {
    return err(new MissingCredentialError('CAUDENA_SECRET'));
  }

  return ok({ kid, secret });
}
