/**
 * Claim Builder
 *
 * Maps a subject, role, custom claims and timing onto the claim set a
 * Supabase backend expects. Pure: the current time is a parameter.
 */

import { ValidationError } from '../errors/index.js';
import { JWT_AUDIENCE, RESERVED_CLAIMS, VERIFIER_CLAIMS } from '../utils/constants.js';
import type { ClaimSet, ClaimValue, CustomClaims } from './types.js';

export interface BuildClaimsOptions {
  /** Value for the `iss` claim, usually `<project url>/auth/v1` */
  readonly issuer?: string;
}

const reserved: ReadonlySet<string> = new Set(RESERVED_CLAIMS);
const verifierClaims: ReadonlySet<string> = new Set(VERIFIER_CLAIMS);

function isClaimValue(value: unknown): value is ClaimValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

/**
 * Build a canonical claim set
 *
 * Mandatory claims come first in fixed order, custom claims follow sorted
 * by key, so equal inputs always serialize identically.
 *
 * @param validityDuration - Seconds the token stays valid; `exp = now + validityDuration`
 * @throws ValidationError for an empty subject or role, a non-positive
 *   duration, a non-positive issue time, a custom claim shadowing a mandatory
 *   or verifier-enforced one, or a non-scalar value
 *
 * @example
 * buildClaims('user-123', 'authenticated', { tenant_id: 'acme' }, 1700000000, 3600)
 * // => { sub: 'user-123', role: 'authenticated', aud: 'authenticated',
 * //      iat: 1700000000, exp: 1700003600, tenant_id: 'acme' }
 */
export function buildClaims(
  subject: string,
  role: string,
  customClaims: CustomClaims,
  now: number,
  validityDuration: number,
  options: BuildClaimsOptions = {}
): ClaimSet {
  if (!subject || subject.trim().length === 0) {
    throw new ValidationError('Subject cannot be empty', 'sub');
  }

  if (!role || role.trim().length === 0) {
    throw new ValidationError('Role cannot be empty', 'role');
  }

  if (!Number.isInteger(validityDuration) || validityDuration <= 0) {
    throw new ValidationError('Validity duration must be a positive whole number of seconds', 'exp');
  }

  // jsonwebtoken replaces a falsy iat with the wall clock
  if (!Number.isInteger(now) || now <= 0) {
    throw new ValidationError('Issue time must be a positive whole number of seconds', 'iat');
  }

  const extra: Record<string, ClaimValue> = {};
  for (const key of Object.keys(customClaims).sort()) {
    if (reserved.has(key)) {
      throw new ValidationError(`Custom claim '${key}' would override a mandatory claim`, key);
    }

    if (verifierClaims.has(key)) {
      throw new ValidationError(`Custom claim '${key}' is enforced by token verification and cannot be set`, key);
    }

    const value: unknown = customClaims[key];
    if (!isClaimValue(value)) {
      throw new ValidationError(`Custom claim '${key}' must be a string, finite number, boolean or null`, key);
    }
    extra[key] = value;
  }

  return {
    sub: subject,
    role,
    aud: JWT_AUDIENCE,
    ...(options.issuer !== undefined ? { iss: options.issuer } : {}),
    iat: now,
    exp: now + validityDuration,
    ...extra,
  };
}
