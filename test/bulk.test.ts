import { describe, expect, it, vi } from 'vitest';
import { checkBulkSize, chunk, chunkedAction, chunkedRequest, requireScopes } from '../src/client/bulk.js';
import { SpotifyScope, type Scope } from '../src/client/scopes.js';
import { MissingScopeError, ParseError, RemoteRequestError, TooManyIdentifiersError } from '../src/client/types.js';

const ids = Array.from({ length: 120 }, (_, i) => `id${i}`);

describe('requireScopes', () => {
  const granted: ReadonlySet<Scope> = new Set([SpotifyScope.UserLibraryRead, SpotifyScope.UserFollowRead]);

  it('passes when every required scope is granted', () => {
    expect(() => requireScopes(granted, [SpotifyScope.UserLibraryRead, SpotifyScope.UserFollowRead])).not.toThrow();
  });

  it('names only the missing scopes', () => {
    let caught: unknown;
    try {
      requireScopes(granted, [SpotifyScope.UserLibraryRead, SpotifyScope.UserTopRead, SpotifyScope.UserFollowModify]);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MissingScopeError);
    expect(caught).toMatchObject({
      missing: ['user-top-read', 'user-follow-modify'],
      anyOf: false,
      message: 'Missing scope: user-top-read, user-follow-modify required',
    });
  });

  it('is satisfied by any one scope in anyOf mode', () => {
    expect(() =>
      requireScopes(granted, [SpotifyScope.UserTopRead, SpotifyScope.UserFollowRead], true),
    ).not.toThrow();
  });

  it('names every candidate when none is granted in anyOf mode', () => {
    expect(() =>
      requireScopes(granted, [SpotifyScope.PlaylistModifyPublic, SpotifyScope.PlaylistModifyPrivate], true),
    ).toThrow('Missing scope: one of playlist-modify-public, playlist-modify-private is required');
  });

  it('passes when nothing is required', () => {
    expect(() => requireScopes(new Set(), [])).not.toThrow();
    expect(() => requireScopes(new Set(), [], true)).not.toThrow();
  });

  it('checks nothing when the granted scopes are unknown', () => {
    expect(() => requireScopes(null, [SpotifyScope.UserTopRead])).not.toThrow();
  });
});

describe('checkBulkSize', () => {
  it('allows up to the per-request maximum', () => {
    expect(() => checkBulkSize(50, 50, false)).not.toThrow();
  });

  it('rejects more ids than one request takes unless bulk requests are allowed', () => {
    expect(() => checkBulkSize(50, 51, false)).toThrow(TooManyIdentifiersError);
    expect(() => checkBulkSize(50, 51, false)).toThrow(
      'Too many ids (51) provided, only 50 allowed. Enable allowBulkRequests to split them across requests.',
    );
    expect(() => checkBulkSize(50, 51, true)).not.toThrow();
  });
});

describe('chunk', () => {
  it('splits into contiguous slices', () => {
    expect(chunk(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
    expect(chunk([], 50)).toEqual([]);
  });

  it('rejects a size below one', () => {
    expect(() => chunk(['a'], 0)).toThrow(RangeError);
  });
});

describe('chunkedRequest', () => {
  it('issues one call per 50 ids and keeps results in input order', async () => {
    const perChunk = vi.fn(async (part: string[]) => part.map((id) => id.toUpperCase()));

    const results = await chunkedRequest(50, ids, perChunk);

    expect(perChunk).toHaveBeenCalledTimes(3);
    expect(perChunk.mock.calls.map(([part]) => part.length)).toEqual([50, 50, 20]);
    expect(perChunk.mock.calls[1][0][0]).toBe('id50');
    expect(results).toHaveLength(120);
    expect(results[0]).toBe('ID0');
    expect(results[119]).toBe('ID119');
  });

  it('makes a single call when the ids fit in one request', async () => {
    const perChunk = vi.fn(async (part: string[]) => part.map(() => true));

    expect(await chunkedRequest(50, ids.slice(0, 50), perChunk)).toHaveLength(50);
    expect(perChunk).toHaveBeenCalledTimes(1);
  });

  it('aborts on the first failing chunk with its error', async () => {
    const failure = new RemoteRequestError('Spotify API 503: Service unavailable', 'https://api.spotify.test', 503);
    const perChunk = vi
      .fn<(part: string[]) => Promise<boolean[]>>()
      .mockResolvedValueOnce(Array.from({ length: 50 }, () => true))
      .mockRejectedValueOnce(failure);

    await expect(chunkedRequest(50, ids, perChunk)).rejects.toBe(failure);
    expect(perChunk).toHaveBeenCalledTimes(2);
  });

  it('rejects a chunk whose result count does not match its ids', async () => {
    const perChunk = vi.fn(async (part: string[]) => part.slice(1));

    await expect(chunkedRequest(50, ids, perChunk)).rejects.toThrow(
      new ParseError('Expected 50 results for 50 ids, got 49'),
    );
    expect(perChunk).toHaveBeenCalledTimes(1);
  });
});

describe('chunkedAction', () => {
  it('runs one action per chunk, sequentially', async () => {
    const order: string[] = [];
    await chunkedAction(50, ids, async (part) => {
      order.push(`${part[0]}..${part[part.length - 1]}`);
    });

    expect(order).toEqual(['id0..id49', 'id50..id99', 'id100..id119']);
  });
});
