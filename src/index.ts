/**
 * Supabase Scoped Session
 *
 * Self-signed, short-lived user tokens for acting as an end user against a
 * Supabase backend with row-level security, plus clients that keep those
 * tokens fresh.
 */

// Clients
export {
  createScopedClient,
  getClient,
  ScopedClientBuilder,
  ScopedSupabaseClient,
  SupabaseRemoteClient,
} from './clients/index.js';
export type { ClientOptions, ScopedClientOptions, FunctionInvokeOptions, TableQuery } from './clients/index.js';

// Sessions
export { RefreshCoordinator, ScopedClient } from './session/index.js';
export type {
  Operation,
  RefreshCoordinatorOptions,
  RemoteClient,
  SessionState,
  TokenSource,
} from './session/index.js';

// Tokens
export { buildClaims, signClaims, verifyToken, decodeToken, issueToken } from './auth/index.js';
export type {
  BuildClaimsOptions,
  ClaimSet,
  ClaimValue,
  CustomClaims,
  IssueTokenOptions,
  MandatoryClaims,
  Token,
  TokenIssuer,
  VerifyTokenOptions,
} from './auth/index.js';

// Configuration
export { loadConfig } from './config/index.js';
export type { Config, ConfigOverrides } from './config/index.js';

// Errors
export {
  ScopedClientError,
  ConfigurationError,
  ValidationError,
  TokenError,
  ClientError,
  InvalidSignatureError,
  ExpiredTokenError,
} from './errors/index.js';

// Logging
export { createConsoleLogger, silentLogger } from './logging/index.js';
export type { Logger, LogLevel, LogContext, ConsoleLoggerOptions } from './logging/index.js';

// Constants
export {
  ROLE_ANON,
  ROLE_AUTHENTICATED,
  ROLE_SERVICE_ROLE,
  DEFAULT_EXPIRY_SECONDS,
  DEFAULT_REFRESH_THRESHOLD_SECONDS,
} from './utils/constants.js';
export { systemClock, type Clock } from './utils/clock.js';
