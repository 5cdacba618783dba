import jwt from 'jsonwebtoken';
import { err, ok, type Result } from 'neverthrow';

import { InvalidSecretError } from './errors.js';

/** Lifetime of a signed token, in seconds. */
export const TOKEN_TTL_SECONDS = 300;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Decode a base64 secret. Standard and URL-safe alphabets are accepted,
 * whitespace is ignored and padding is optional.
 */
export function decodeSecret(secret: string): Result<Buffer, InvalidSecretError> {
  const normalized = secret.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/');

  if (!normalized) {
    return err(new InvalidSecretError('secret is empty'));
  }
  if (!BASE64_PATTERN.test(normalized)) {
    return err(new InvalidSecretError('secret is not valid base64'));
  }
  if (normalized.replace(/=+$/, '').length % 4 === 1) {
    return err(new InvalidSecretError('secret has an invalid base64 length'));
  }

  const key = Buffer.from(normalized, 'base64');
  if (key.length === 0) {
    return err(new InvalidSecretError('secret decodes to zero bytes'));
  }
  return ok(key);
}

export interface TokenPayload {
  exp: number;
  kid: string;
}

export function buildTokenPayload(kid: string, nowMs: number): TokenPayload {
  return { kid, exp: Math.floor(nowMs / 1000) + TOKEN_TTL_SECONDS };
}

/**
 * HS256 token carrying only `kid` and `exp`.
 */
export function signToken(kid: string, key: Buffer, nowMs: number): string {
  return jwt.sign(buildTokenPayload(kid, nowMs), key, { algorithm: 'HS256', noTimestamp: true });
}
