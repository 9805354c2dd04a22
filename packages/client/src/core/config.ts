/**
 * GeoLayer Client Configuration
 *
 * Defaults, environment loading and validation for the client.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable. Values read
 * from the environment are validated before use.
 */

import { z } from 'zod';
import { InvalidRequestError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * How the dispatcher runs a call.
 *
 * - `sync`: the caller awaits the decoded result directly
 * - `deferred`: the call is queued on the worker pool and a handle is returned
 */
export type ExecutionMode = 'sync' | 'deferred';

/**
 * OAuth consumer credentials
 *
 * NEVER hardcode credentials in source code.
 */
export interface OAuthCredentials {
  readonly consumerKey: string;
  readonly consumerSecret: string;
}

export interface GeoLayerConfig {
  /** Service root, including the API version segment */
  readonly baseUrl: string;

  /** Signing credentials; requests fail as not authorized without them */
  readonly credentials?: OAuthCredentials;

  /** Initial execution mode of the client */
  readonly mode: ExecutionMode;

  /** Worker pool capacity for deferred calls */
  readonly maxConcurrent: number;

  /** Transport timeout in milliseconds */
  readonly timeoutMs: number;

  readonly userAgent: string;
}

// ============================================================================
// Defaults
// ============================================================================

export const CLIENT_VERSION = '0.1.0';

export const DEFAULT_CONFIG: GeoLayerConfig = {
  baseUrl: 'https://api.geolayer.dev/0.1',
  mode: 'sync',
  maxConcurrent: 5,
  timeoutMs: 30000,
  userAgent: `geolayer-client/${CLIENT_VERSION}`,
};

// ============================================================================
// Validation
// ============================================================================

const ConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('baseUrl must be an absolute URL')
    .transform((url) => url.replace(/\/+$/, '')),
  credentials: z
    .object({
      consumerKey: z.string().min(1, 'consumerKey must not be empty'),
      consumerSecret: z.string().min(1, 'consumerSecret must not be empty'),
    })
    .optional(),
  mode: z.enum(['sync', 'deferred']),
  maxConcurrent: z.number().int().positive('maxConcurrent must be a positive integer'),
  timeoutMs: z.number().int().positive('timeoutMs must be a positive integer'),
  userAgent: z.string().min(1),
});

/**
 * Read OAuth credentials from the environment
 *
 * Environment variables:
 * - GEOLAYER_OAUTH_KEY
 * - GEOLAYER_OAUTH_SECRET
 *
 * @returns credentials when both are set, otherwise undefined
 */
export function getCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): OAuthCredentials | undefined {
  const consumerKey = env.GEOLAYER_OAUTH_KEY;
  const consumerSecret = env.GEOLAYER_OAUTH_SECRET;

  if (!consumerKey || !consumerSecret) {
    return undefined;
  }

  return { consumerKey, consumerSecret };
}

function parseIntegerEnv(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

function readEnv(env: NodeJS.ProcessEnv): Partial<Record<keyof GeoLayerConfig, unknown>> {
  const overrides: Partial<Record<keyof GeoLayerConfig, unknown>> = {};

  if (env.GEOLAYER_API_URL) overrides.baseUrl = env.GEOLAYER_API_URL;
  if (env.GEOLAYER_MODE) overrides.mode = env.GEOLAYER_MODE;

  const maxConcurrent = parseIntegerEnv(env.GEOLAYER_MAX_CONCURRENT);
  if (maxConcurrent !== undefined) overrides.maxConcurrent = maxConcurrent;

  const timeoutMs = parseIntegerEnv(env.GEOLAYER_TIMEOUT_MS);
  if (timeoutMs !== undefined) overrides.timeoutMs = timeoutMs;

  const credentials = getCredentialsFromEnv(env);
  if (credentials) overrides.credentials = credentials;

  return overrides;
}

/**
 * Build the client configuration
 *
 * Precedence: explicit overrides, then environment, then defaults.
 *
 * @throws {InvalidRequestError} naming the first invalid field
 */
export function loadConfig(
  overrides: Partial<GeoLayerConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): GeoLayerConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...readEnv(env),
    ...Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined)),
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'config';
    throw new InvalidRequestError(`Invalid configuration for ${field}: ${issue?.message ?? 'invalid value'}`);
  }

  return result.data;
}
