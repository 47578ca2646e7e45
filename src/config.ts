/**
 * config.ts: Environment configuration for the MCP server entry point.
 *
 * Values come from process.env (populated from .env by dotenv in src/index.ts)
 * and are validated once at startup.
 */

import { z } from 'zod';
import { parseScopes } from './client/scopes.js';
import type { SpotifyClientOptions } from './client/types.js';

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  SPOTIFY_ACCESS_TOKEN: z.string().min(1, 'SPOTIFY_ACCESS_TOKEN is required'),
  SPOTIFY_SCOPES: z.string().optional(),
  SPOTIFY_API_BASE_URL: z.string().url().default('https://api.spotify.com/v1'),
  SPOTIFY_ALLOW_BULK_REQUESTS: BooleanFlag,
  SPOTIFY_DEFAULT_LIMIT: z.coerce.number().int().min(1).max(50).optional(),
  SPOTIFY_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  SPOTIFY_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SPOTIFY_MAX_RETRIES: z.coerce.number().int().min(0).default(4),
  SPOTIFY_MAX_RETRY_WAIT_MS: z.coerce.number().int().min(0).default(60_000),
  SPOTIFY_READ_ONLY: BooleanFlag,
});

export type Env = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * loadConfig: validates the environment and maps it to SpotifyClient options.
 *
 * SPOTIFY_SCOPES is the space-separated scope string issued with the token;
 * leave it unset when the scopes are unknown and the scope guard should not check.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SpotifyClientOptions {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    accessToken: e.SPOTIFY_ACCESS_TOKEN,
    scopes: e.SPOTIFY_SCOPES === undefined ? undefined : parseScopes(e.SPOTIFY_SCOPES),
    baseUrl: e.SPOTIFY_API_BASE_URL,
    allowBulkRequests: e.SPOTIFY_ALLOW_BULK_REQUESTS,
    defaultLimit: e.SPOTIFY_DEFAULT_LIMIT,
    maxConcurrent: e.SPOTIFY_MAX_CONCURRENT,
    timeoutMs: e.SPOTIFY_REQUEST_TIMEOUT_MS,
    maxRetries: e.SPOTIFY_MAX_RETRIES,
    maxRetryWaitMs: e.SPOTIFY_MAX_RETRY_WAIT_MS,
    readOnly: e.SPOTIFY_READ_ONLY,
  };
}
