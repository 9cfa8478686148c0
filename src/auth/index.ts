/**
 * Token Module
 *
 * Claim building, HS256 signing/verification and token issuance for
 * Supabase user impersonation.
 */

// Claim Builder
export { buildClaims, type BuildClaimsOptions } from './claims.js';

// JWT Utilities
export {
  signClaims,
  verifyToken,
  decodeToken,
  assertSigningSecret,
  type VerifyTokenOptions,
} from './jwt.js';

// Issuer
export { issueToken, type TokenIssuer } from './issuer.js';

// Types
export type {
  ClaimSet,
  ClaimValue,
  CustomClaims,
  IssueTokenOptions,
  MandatoryClaims,
  Token,
} from './types.js';
