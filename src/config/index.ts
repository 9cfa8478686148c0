/**
 * Configuration
 *
 * Loads the Supabase project URL, API key and JWT secret from the
 * environment or from explicit overrides, and validates them once.
 * The resulting Config is frozen and shared by every session built from it.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import {
  ENV_SUPABASE_JWT_SECRET,
  ENV_SUPABASE_KEY,
  ENV_SUPABASE_URL,
} from '../utils/constants.js';

/**
 * Connection and signing settings
 */
export interface Config {
  /** Project URL, without trailing slash */
  readonly supabaseUrl: string;

  /** API key sent as `apikey` (usually the anon key) */
  readonly supabaseKey: string;

  /** Shared HS256 secret the backend verifies user tokens with */
  readonly jwtSecret: string;
}

export type ConfigOverrides = Partial<Record<keyof Config, string>>;

const nonBlank = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .refine((value) => value.trim().length > 0, { message: `${label} cannot be empty` });

const configSchema = z.object({
  supabaseUrl: z
    .string({ required_error: 'supabaseUrl is required' })
    .url({ message: 'supabaseUrl must be a valid URL' })
    .refine((value) => /^https?:\/\//i.test(value), {
      message: 'supabaseUrl must use http or https',
    })
    .transform((value) => value.replace(/\/+$/, '')),
  supabaseKey: nonBlank('supabaseKey'),
  jwtSecret: nonBlank('jwtSecret'),
});

/**
 * Load configuration, overrides first, then environment variables
 *
 * @throws ConfigurationError naming the first invalid field
 *
 * @example
 * const config = loadConfig({ jwtSecret: process.env.MY_SECRET });
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: Readonly<Record<string, string | undefined>> = process.env
): Config {
  const parsed = configSchema.safeParse({
    supabaseUrl: overrides.supabaseUrl ?? env[ENV_SUPABASE_URL],
    supabaseKey: overrides.supabaseKey ?? env[ENV_SUPABASE_KEY],
    jwtSecret: overrides.jwtSecret ?? env[ENV_SUPABASE_JWT_SECRET],
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const fieldName = issue !== undefined && issue.path.length > 0 ? String(issue.path[0]) : 'config';
    throw new ConfigurationError(fieldName, issue?.message ?? parsed.error.message);
  }

  return Object.freeze(parsed.data);
}
