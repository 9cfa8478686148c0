/**
 * Token Issuer
 *
 * Builds the claim set for a user and signs it with the project's JWT
 * secret. Stateless; safe to call concurrently.
 */

import type { Config } from '../config/index.js';
import { ClientError, ScopedClientError, TokenError } from '../errors/index.js';
import {
  AUTH_V1_BASE_PATH,
  DEFAULT_EXPIRY_SECONDS,
  ROLE_AUTHENTICATED,
} from '../utils/constants.js';
import { systemClock } from '../utils/clock.js';
import { buildClaims } from './claims.js';
import { signClaims } from './jwt.js';
import type { IssueTokenOptions, Token } from './types.js';

/**
 * Signature shared by issueToken and any replacement the refresh
 * coordinator is given
 */
export type TokenIssuer = (
  config: Config,
  subject: string,
  options: IssueTokenOptions
) => Token | Promise<Token>;

/**
 * Issue a user token
 *
 * @param subject - ID of the user to impersonate
 * @throws ClientError if subject is empty
 * @throws ValidationError / ConfigurationError for bad claims or secret
 * @throws TokenError if the signing library fails unexpectedly
 *
 * @example
 * const token = issueToken(config, 'user-123', { customClaims: { tenant_id: 'acme' } });
 * token.claims.sub // => 'user-123'
 */
export function issueToken(config: Config, subject: string, options: IssueTokenOptions = {}): Token {
  if (!subject || subject.trim().length === 0) {
    throw new ClientError('userId cannot be empty');
  }

  const claims = buildClaims(
    subject,
    options.role ?? ROLE_AUTHENTICATED,
    options.customClaims ?? {},
    options.now ?? systemClock(),
    options.expirySeconds ?? DEFAULT_EXPIRY_SECONDS,
    { issuer: `${config.supabaseUrl}${AUTH_V1_BASE_PATH}` }
  );

  let value: string;
  try {
    value = signClaims(claims, config.jwtSecret);
  } catch (error) {
    if (error instanceof ScopedClientError) {
      throw error;
    }
    throw new TokenError('Failed to sign token', error, { sub: subject });
  }

  return Object.freeze({
    value,
    claims: Object.freeze(claims),
    expiresAt: claims.exp,
  });
}
