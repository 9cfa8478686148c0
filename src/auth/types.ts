/**
 * Token Type Definitions
 *
 * Claim sets and issued tokens for Supabase user impersonation.
 */

/**
 * Value allowed in a custom claim (JSON scalar)
 */
export type ClaimValue = string | number | boolean | null;

/**
 * Caller-supplied claims merged at the top level of the JWT payload
 */
export type CustomClaims = Readonly<Record<string, ClaimValue>>;

/**
 * Claims every issued token carries
 */
export interface MandatoryClaims {
  /** Subject - the impersonated user's ID */
  readonly sub: string;
  /** Postgres role the backend switches to (e.g. "authenticated") */
  readonly role: string;
  /** Audience - always "authenticated" */
  readonly aud: string;
  /** Issuer - `<project url>/auth/v1`, omitted when no issuer base is known */
  readonly iss?: string;
  /** Issued at (seconds since epoch) */
  readonly iat: number;
  /** Expiration (seconds since epoch), strictly after iat */
  readonly exp: number;
}

/**
 * Complete claim set: mandatory claims plus custom claims
 */
export type ClaimSet = MandatoryClaims & Readonly<Record<string, ClaimValue | undefined>>;

/**
 * A signed token and the claims it encodes
 *
 * Immutable; a refresh produces a new Token.
 */
export interface Token {
  /** Compact JWT (header.payload.signature) */
  readonly value: string;
  readonly claims: ClaimSet;
  /** Same as claims.exp */
  readonly expiresAt: number;
}

/**
 * Options for issuing a token
 */
export interface IssueTokenOptions {
  /** Role claim (default: "authenticated") */
  readonly role?: string;
  /** Additional claims */
  readonly customClaims?: CustomClaims;
  /** Token validity in seconds (default: 3600) */
  readonly expirySeconds?: number;
  /** Issue time in seconds since epoch (default: now) */
  readonly now?: number;
}
