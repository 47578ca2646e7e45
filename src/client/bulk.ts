/**
 * bulk.ts: Scope guard and id-list chunking for multi-id endpoints.
 *
 * Both checks are local and run before the first request of an operation.
 * Chunked requests run one after another; the first failing chunk aborts the
 * operation and its error reaches the caller unchanged, with no partial result.
 */

import type { Scope } from './scopes.js';
import { MissingScopeError, ParseError, TooManyIdentifiersError } from './types.js';

/**
 * requireScopes: fails with MissingScopeError unless `granted` covers `required`.
 *
 * anyOf=false: every required scope must be granted; the error names the absent ones.
 * anyOf=true:  one granted scope is enough; the error names all of them.
 * granted=null means the token's scopes are unknown and nothing is checked.
 */
export function requireScopes(
  granted: ReadonlySet<Scope> | null,
  required: readonly Scope[],
  anyOf = false,
): void {
  if (granted === null || required.length === 0) return;

  if (anyOf) {
    if (!required.some((scope) => granted.has(scope))) {
      throw new MissingScopeError(required, true);
    }
    return;
  }

  const missing = required.filter((scope) => !granted.has(scope));
  if (missing.length > 0) {
    throw new MissingScopeError(missing, false);
  }
}

/**
 * checkBulkSize: fails with TooManyIdentifiersError when one request cannot
 * take `requestedCount` ids and the client has not opted into bulk requests.
 */
export function checkBulkSize(maxPerRequest: number, requestedCount: number, allowBulkRequests: boolean): void {
  if (requestedCount > maxPerRequest && !allowBulkRequests) {
    throw new TooManyIdentifiersError(requestedCount, maxPerRequest);
  }
}

/** Contiguous slices of at most `size` elements, in order. */
export function chunk<I>(items: readonly I[], size: number): I[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: I[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * chunkedRequest: calls `perChunk` once per chunk of `ids`, sequentially, and
 * concatenates the results. Position i of the result belongs to ids[i]; a chunk
 * whose result length differs from its id count fails with ParseError.
 */
export async function chunkedRequest<I, R>(
  maxPerRequest: number,
  ids: readonly I[],
  perChunk: (chunk: I[]) => Promise<readonly R[]>,
): Promise<R[]> {
  const results: R[] = [];
  for (const part of chunk(ids, maxPerRequest)) {
    const partResults = await perChunk(part);
    if (partResults.length !== part.length) {
      throw new ParseError(`Expected ${part.length} results for ${part.length} ids, got ${partResults.length}`);
    }
    results.push(...partResults);
  }
  return results;
}

/** chunkedAction: like chunkedRequest for requests that return nothing (PUT/DELETE). */
export async function chunkedAction<I>(
  maxPerRequest: number,
  ids: readonly I[],
  perChunk: (chunk: I[]) => Promise<void>,
): Promise<void> {
  for (const part of chunk(ids, maxPerRequest)) {
    await perChunk(part);
  }
}
