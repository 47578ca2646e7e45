import { HTTPError } from 'got';
import { setTimeout as delay } from 'node:timers/promises';
import { errorMessageFrom } from './decode.js';
import { RateLimitError } from './types.js';

const BACKOFF_BASE_MS = 1000;
const BACKOFF_CAP_MS = 30_000;

/** How the executor answers HTTP 429. */
export interface RetryPolicy {
  /** Retries after the first 429. 0 fails on the first one. */
  maxRetries: number;
  /** Longest single wait. A 429 asking for more fails at once rather than blocking the caller. */
  maxWaitMs: number;
}

/**
 * Retry-After in milliseconds. Spotify sends delta seconds; an HTTP date is
 * read relative to now. null when the header is missing or unreadable.
 */
export function parseRetryAfter(header: string | string[] | undefined): number | null {
  const value = (Array.isArray(header) ? header[0] : header)?.trim();
  if (!value) return null;
  if (/^\d+(\.\d+)?$/.test(value)) return Math.floor(Number(value) * 1000);
  const at = Date.parse(value);
  return Number.isNaN(at) ? null : Math.max(0, at - Date.now());
}

/** Wait before retry `attempt` when Spotify gives no Retry-After: doubling, with equal jitter. */
export function backoffDelay(attempt: number): number {
  const ceiling = Math.min(BACKOFF_BASE_MS * 2 ** attempt, BACKOFF_CAP_MS);
  return Math.round(ceiling / 2 + (Math.random() * ceiling) / 2);
}

/**
 * sendWithRetry: runs `send` and repeats it while Spotify answers 429.
 *
 * Gives up with RateLimitError, carrying the wait Spotify asked for and its
 * message, after `maxRetries` retries or when that wait exceeds `maxWaitMs`.
 * Every other failure is rethrown untouched.
 */
export async function sendWithRetry<T>(send: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await send();
    } catch (error) {
      if (!(error instanceof HTTPError) || error.response.statusCode !== 429) throw error;

      const waitMs = parseRetryAfter(error.response.headers['retry-after']) ?? backoffDelay(attempt);
      if (attempt >= policy.maxRetries || waitMs > policy.maxWaitMs) {
        throw new RateLimitError(error.response.url, waitMs, errorMessageFrom(error.response.body), { cause: error });
      }
      await delay(waitMs);
    }
  }
}
