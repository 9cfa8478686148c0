/**
 * Application Constants
 *
 * Centralized constants for claim names, roles and token timing defaults
 * used throughout the library.
 */

// Authentication Roles
export const ROLE_ANON = 'anon' as const;
export const ROLE_AUTHENTICATED = 'authenticated' as const;
export const ROLE_SERVICE_ROLE = 'service_role' as const;

// JWT
export const JWT_ALGORITHM = 'HS256' as const;
export const JWT_AUDIENCE = 'authenticated';
export const AUTH_V1_BASE_PATH = '/auth/v1';
export const MIN_JWT_SECRET_LENGTH = 32;

// Claims that custom claims may never shadow
export const RESERVED_CLAIMS = ['sub', 'role', 'aud', 'iss', 'iat', 'exp'] as const;

// Registered claims jsonwebtoken enforces on sign and verify
export const VERIFIER_CLAIMS = ['nbf'] as const;

// Token lifecycle
export const DEFAULT_EXPIRY_SECONDS = 3600; // 1 hour
export const DEFAULT_REFRESH_THRESHOLD_SECONDS = 60;

// Environment variables read by loadConfig()
export const ENV_SUPABASE_URL = 'SUPABASE_URL';
export const ENV_SUPABASE_KEY = 'SUPABASE_KEY';
export const ENV_SUPABASE_JWT_SECRET = 'SUPABASE_JWT_SECRET';
