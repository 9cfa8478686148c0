/**
 * JWT Utilities
 *
 * Signs claim sets into HS256 JWTs a Supabase backend accepts, and verifies
 * them with the same shared secret.
 */

import jwt from 'jsonwebtoken';
import { ConfigurationError, ExpiredTokenError, InvalidSignatureError, ValidationError } from '../errors/index.js';
import { JWT_ALGORITHM, MIN_JWT_SECRET_LENGTH } from '../utils/constants.js';
import { systemClock } from '../utils/clock.js';
import type { ClaimSet } from './types.js';

export interface VerifyTokenOptions {
  /** Current time in seconds since epoch (default: wall clock) */
  readonly now?: number;
}

/**
 * Reject secrets too short to carry a 256-bit HMAC key
 */
export function assertSigningSecret(secret: string): void {
  if (!secret || secret.trim().length === 0) {
    throw new ConfigurationError('jwtSecret', 'cannot be empty');
  }

  if (secret.length < MIN_JWT_SECRET_LENGTH) {
    throw new ConfigurationError('jwtSecret', `must be at least ${MIN_JWT_SECRET_LENGTH} characters`);
  }
}

function isClaimSet(payload: unknown): payload is ClaimSet {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    return false;
  }

  const record: Record<string, unknown> = { ...payload };
  return (
    typeof record['sub'] === 'string' &&
    typeof record['role'] === 'string' &&
    typeof record['aud'] === 'string' &&
    typeof record['iat'] === 'number' &&
    typeof record['exp'] === 'number'
  );
}

/**
 * Sign a claim set
 *
 * `iat` and `exp` are taken from the claims as-is, so identical claims and
 * secret always give the identical token.
 *
 * @returns Compact JWT string
 */
export function signClaims(claims: ClaimSet, secret: string): string {
  assertSigningSecret(secret);

  return jwt.sign({ ...claims }, secret, {
    algorithm: JWT_ALGORITHM,
  });
}

/**
 * Verify a token's signature and expiry
 *
 * The signature is checked before any claim, so a tampered token is always
 * reported as InvalidSignatureError.
 *
 * @throws InvalidSignatureError if the signature or token format is wrong
 * @throws ExpiredTokenError if `now >= exp`
 * @throws ValidationError if a validly signed payload is not a claim set
 */
export function verifyToken(token: string, secret: string, options: VerifyTokenOptions = {}): ClaimSet {
  assertSigningSecret(secret);

  let payload: unknown;
  try {
    payload = jwt.verify(token, secret, {
      algorithms: [JWT_ALGORITHM],
      clockTimestamp: options.now ?? systemClock(),
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new ExpiredTokenError(Math.floor(error.expiredAt.getTime() / 1000));
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidSignatureError(`Token verification failed: ${reason}`, error);
  }

  if (!isClaimSet(payload)) {
    throw new ValidationError('Token payload is missing mandatory claims');
  }

  return payload;
}

/**
 * Read a token's claim set without checking signature or expiry
 *
 * Not for trust decisions; use verifyToken for that. Returns null when the
 * token is not a JWT or its payload lacks the mandatory claims.
 */
export function decodeToken(token: string): ClaimSet | null {
  try {
    const decoded = jwt.decode(token);
    return isClaimSet(decoded) ? decoded : null;
  } catch {
    return null;
  }
}
