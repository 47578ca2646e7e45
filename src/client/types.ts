import type { Scope } from './scopes.js';

// Credentials and tuning passed to the SpotifyClient constructor
export interface SpotifyClientOptions {
  accessToken: string;
  // Scopes granted to accessToken. When undefined the scope guard cannot check anything and lets requests through.
  scopes?: readonly Scope[];
  baseUrl?: string;
  // Split oversized id lists into several requests instead of failing with TooManyIdentifiersError
  allowBulkRequests?: boolean;
  defaultLimit?: number;
  maxConcurrent?: number;
  timeoutMs?: number;
  // Retries after the first 429 before giving up with RateLimitError
  maxRetries?: number;
  // A 429 asking to wait longer than this fails at once
  maxRetryWaitMs?: number;
  readOnly?: boolean;
}

// Query parameters for internal use; undefined values are skipped
export type QueryParams = Record<string, string | number | boolean | undefined>;

export type SpotifyErrorCode =
  | 'MISSING_SCOPE'
  | 'TOO_MANY_IDENTIFIERS'
  | 'UNSUPPORTED_DIRECTION'
  | 'UNRECOGNIZED_ITEM_KIND'
  | 'REMOTE_REQUEST_FAILED'
  | 'PARSE_ERROR'
  | 'INVALID_URI'
  | 'READ_ONLY';

// Base class for every error this library raises itself
export abstract class SpotifyError extends Error {
  abstract readonly code: SpotifyErrorCode;
}

// Thrown before any request when the token lacks a scope the endpoint needs
export class MissingScopeError extends SpotifyError {
  readonly code = 'MISSING_SCOPE';
  readonly missing: readonly Scope[];
  readonly anyOf: boolean;
  constructor(missing: readonly Scope[], anyOf: boolean) {
    super(
      anyOf
        ? `Missing scope: one of ${missing.join(', ')} is required`
        : `Missing scope: ${missing.join(', ')} required`,
    );
    this.name = 'MissingScopeError';
    this.missing = missing;
    this.anyOf = anyOf;
  }
}

// Thrown when more ids are supplied than one request takes and bulk requests are off
export class TooManyIdentifiersError extends SpotifyError {
  readonly code = 'TOO_MANY_IDENTIFIERS';
  readonly requested: number;
  readonly maxPerRequest: number;
  constructor(requested: number, maxPerRequest: number) {
    super(
      `Too many ids (${requested}) provided, only ${maxPerRequest} allowed. ` +
        'Enable allowBulkRequests to split them across requests.',
    );
    this.name = 'TooManyIdentifiersError';
    this.requested = requested;
    this.maxPerRequest = maxPerRequest;
  }
}

// Thrown when a cursor-based page is asked to go backwards
export class UnsupportedDirectionError extends SpotifyError {
  readonly code = 'UNSUPPORTED_DIRECTION';
  constructor(href: string) {
    super(`Cursor-based pages only go forwards (${href})`);
    this.name = 'UnsupportedDirectionError';
  }
}

// Thrown when a page is decoded with an item kind the decoder registry does not know
export class UnrecognizedItemKindError extends SpotifyError {
  readonly code = 'UNRECOGNIZED_ITEM_KIND';
  readonly itemKind: string;
  constructor(itemKind: string, paging: 'offset' | 'cursor') {
    super(`Unknown ${paging} page item kind "${itemKind}"`);
    this.name = 'UnrecognizedItemKindError';
    this.itemKind = itemKind;
  }
}

// A non-2xx response or a transport failure
export class RemoteRequestError extends SpotifyError {
  readonly code = 'REMOTE_REQUEST_FAILED';
  readonly statusCode: number | null;
  readonly url: string;
  constructor(message: string, url: string, statusCode: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RemoteRequestError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

// Thrown once rate limit retries are exhausted, never during a normal retry
export class RateLimitError extends RemoteRequestError {
  readonly retryAfterMs: number;
  constructor(url: string, retryAfterMs: number, detail?: string, options?: { cause?: unknown }) {
    super(`Spotify API 429: ${detail ?? 'rate limit exceeded'}. Retry after ${retryAfterMs}ms`, url, 429, options);
    this.name = 'RateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

// A response body that does not match the expected schema
export class ParseError extends SpotifyError {
  readonly code = 'PARSE_ERROR';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

// An id argument that is a URI or link for another object type
export class InvalidUriError extends SpotifyError {
  readonly code = 'INVALID_URI';
  readonly input: string;
  constructor(input: string, expectedType: string) {
    super(`"${input}" is not a valid ${expectedType} id, URI or link`);
    this.name = 'InvalidUriError';
    this.input = input;
  }
}

// Thrown when a non-GET method is attempted on a read-only client
export class ReadOnlyError extends SpotifyError {
  readonly code = 'READ_ONLY';
  constructor(method: string) {
    super(`SpotifyClient is read-only. Blocked method: ${method}`);
    this.name = 'ReadOnlyError';
  }
}
