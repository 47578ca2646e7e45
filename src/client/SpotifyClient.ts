import got, { HTTPError, RequestError, type Got, type Method } from 'got';
import { z } from 'zod';
import { chunkedAction, chunkedRequest, checkBulkSize, requireScopes } from './bulk.js';
import { errorMessageFrom, parseBody } from './decode.js';
import { decodeCursorPage, decodePage } from './item-kinds.js';
import type { CursorPage, Page, PagingRequester } from './paging.js';
import { sendWithRetry, type RetryPolicy } from './rate-limit.js';
import {
  EpisodeListSchema,
  EpisodeSchema,
  UserProfileSchema,
  type Artist,
  type Episode,
  type PlayHistory,
  type PlaylistTrack,
  type SavedAlbum,
  type SavedEpisode,
  type SavedShow,
  type SavedTrack,
  type SimpleTrack,
  type Track,
  type UserProfile,
} from './schemas/index.js';
import { SpotifyScope, type Scope } from './scopes.js';
import {
  type QueryParams,
  type SpotifyClientOptions,
  ReadOnlyError,
  RemoteRequestError,
  SpotifyError,
} from './types.js';
import { toSpotifyId, type SpotifyObjectType } from './uri.js';

const DEFAULT_BASE_URL = 'https://api.spotify.com/v1';

// Spotify accepts at most 50 ids on every multi-id endpoint used here
const MAX_IDS_PER_REQUEST = 50;

export type LibraryType = 'tracks' | 'albums' | 'episodes' | 'shows';

const LIBRARY_OBJECT_TYPES: Record<LibraryType, SpotifyObjectType> = {
  tracks: 'track',
  albums: 'album',
  episodes: 'episode',
  shows: 'show',
};

export type TimeRange = 'short_term' | 'medium_term' | 'long_term';

export interface PageOptions {
  limit?: number;
  offset?: number;
  market?: string;
}

export interface CursorOptions {
  limit?: number;
  after?: string;
  before?: string;
}

const BooleanListSchema = z.array(z.boolean());

// playlists/{id}/followers/contains answers for exactly the one user asked about
const SingleBooleanSchema = z.tuple([z.boolean()]);

/**
 * Maps whatever got threw into this library's error types.
 *
 * Got wraps errors thrown in beforeRequest hooks in a RequestError with the
 * original error stored in error.cause. Callers receive ReadOnlyError directly.
 */
function toSpotifyError(error: unknown, url: string): unknown {
  if (error instanceof SpotifyError) return error;
  if (error instanceof RequestError && error.cause instanceof ReadOnlyError) return error.cause;
  if (error instanceof HTTPError) {
    const status = error.response.statusCode;
    const message = errorMessageFrom(error.response.body) ?? error.response.statusMessage ?? 'Request failed';
    return new RemoteRequestError(`Spotify API ${status}: ${message}`, url, status, { cause: error });
  }
  if (error instanceof RequestError) {
    return new RemoteRequestError(`Spotify request failed: ${error.message}`, url, null, { cause: error });
  }
  return error;
}

/**
 * SpotifyClient: HTTP client for the Spotify Web API.
 *
 * Design constraints:
 *   - One instance = one access token and its granted scopes
 *   - Scope and bulk-size checks run before any network request
 *   - Max `maxConcurrent` (default 5) in-flight requests per instance
 *   - 429s are retried per RetryPolicy (maxRetries, maxRetryWaitMs)
 *   - Optional read-only mode: any non-GET method throws ReadOnlyError before a network request
 *
 * The client is also the PagingRequester of every page it returns, so
 * page.getNext() and friends go through the same auth, limits and retries.
 */
export class SpotifyClient implements PagingRequester {
  private readonly baseUrl: string;
  private readonly grantedScopes: ReadonlySet<Scope> | null;
  private readonly allowBulkRequests: boolean;
  private readonly defaultLimit: number | undefined;
  private readonly retryPolicy: RetryPolicy;

  // got instance with auth headers and the read-only hook
  private readonly instance: Got;

  // Concurrency semaphore
  private readonly maxConcurrent: number;
  private inFlight = 0;
  private readonly queue: Array<() => void> = [];

  constructor(options: SpotifyClientOptions) {
    if (!options.accessToken) {
      throw new Error('Spotify access token is required');
    }
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.grantedScopes = options.scopes ? new Set(options.scopes) : null;
    this.allowBulkRequests = options.allowBulkRequests ?? false;
    this.defaultLimit = options.defaultLimit;
    this.retryPolicy = {
      maxRetries: options.maxRetries ?? 4,
      maxWaitMs: options.maxRetryWaitMs ?? 60_000,
    };
    this.maxConcurrent = options.maxConcurrent ?? 5;
    const readOnly = options.readOnly ?? false;

    this.instance = got.extend({
      headers: {
        'Authorization': `Bearer ${options.accessToken}`,
        'Accept': 'application/json',
      },
      timeout: { request: options.timeoutMs ?? 30_000 },
      // got's own retry is off; sendWithRetry handles 429s
      retry: { limit: 0 },
      hooks: {
        beforeRequest: [
          (requestOptions) => {
            const method = requestOptions.method.toUpperCase();
            if (readOnly && method !== 'GET') {
              throw new ReadOnlyError(method);
            }
          },
        ],
      },
    });
  }

  // Acquire a concurrency slot
  private async acquire(): Promise<void> {
    if (this.inFlight < this.maxConcurrent) {
      this.inFlight++;
      return;
    }
    return new Promise<void>((resolve) => this.queue.push(resolve));
  }

  // Release a concurrency slot and unblock next queued request
  private release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the slot directly to the next waiter (inFlight count stays the same)
      next();
    } else {
      this.inFlight--;
    }
  }

  /**
   * resolveUrl: absolute URLs (next/previous links) are used as given;
   * paths are appended to baseUrl. Undefined query values are skipped.
   */
  private resolveUrl(pathOrUrl: string, query?: QueryParams): string {
    const url = new URL(
      /^https?:\/\//i.test(pathOrUrl) ? pathOrUrl : `${this.baseUrl}/${pathOrUrl.replace(/^\/+/, '')}`,
    );
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private async send(method: Method, pathOrUrl: string, options?: { query?: QueryParams; json?: unknown }): Promise<unknown> {
    const url = this.resolveUrl(pathOrUrl, options?.query);
    const json = options?.json;
    await this.acquire();
    try {
      return await sendWithRetry(
        () => this.instance(url, json === undefined ? { method } : { method, json }).json<unknown>(),
        this.retryPolicy,
      );
    } catch (error) {
      throw toSpotifyError(error, url);
    } finally {
      this.release();
    }
  }

  /**
   * GET request: returns the parsed JSON body.
   *
   * Also the PagingRequester entry point: pages call it with their next/previous URLs.
   */
  get(pathOrUrl: string, query?: QueryParams): Promise<unknown> {
    return this.send('GET', pathOrUrl, { query });
  }

  private async put(path: string, query?: QueryParams, json?: unknown): Promise<void> {
    await this.send('PUT', path, { query, json });
  }

  private async delete(path: string, query?: QueryParams): Promise<void> {
    await this.send('DELETE', path, { query });
  }

  // ---------------------------------------------------------------------------
  // Guards
  // ---------------------------------------------------------------------------

  /** Fails with MissingScopeError when the token was not granted `required` (or, with anyOf, any of it). */
  requireScopes(required: readonly Scope[], anyOf = false): void {
    requireScopes(this.grantedScopes, required, anyOf);
  }

  /** Fails with TooManyIdentifiersError when `requestedCount` ids need more than one request and bulk requests are off. */
  checkBulkSize(maxPerRequest: number, requestedCount: number): void {
    checkBulkSize(maxPerRequest, requestedCount, this.allowBulkRequests);
  }

  private ids(type: SpotifyObjectType, chunk: readonly string[]): string {
    return chunk.map((id) => toSpotifyId(type, id)).join(',');
  }

  // ---------------------------------------------------------------------------
  // Profile
  // ---------------------------------------------------------------------------

  async getCurrentUserProfile(): Promise<UserProfile> {
    return parseBody(UserProfileSchema, await this.get('me'), 'user profile');
  }

  // ---------------------------------------------------------------------------
  // Library
  // ---------------------------------------------------------------------------

  /** Saved tracks, most recently saved first. Requires user-library-read. */
  async getSavedTracks(options: PageOptions = {}): Promise<Page<SavedTrack>> {
    this.requireScopes([SpotifyScope.UserLibraryRead]);
    const body = await this.get('me/tracks', this.pageQuery(options));
    return decodePage('saved-track', body, this);
  }

  async getSavedAlbums(options: PageOptions = {}): Promise<Page<SavedAlbum>> {
    this.requireScopes([SpotifyScope.UserLibraryRead]);
    const body = await this.get('me/albums', this.pageQuery(options));
    return decodePage('saved-album', body, this);
  }

  async getSavedShows(options: Omit<PageOptions, 'market'> = {}): Promise<Page<SavedShow>> {
    this.requireScopes([SpotifyScope.UserLibraryRead]);
    const body = await this.get('me/shows', this.pageQuery(options));
    return decodePage('saved-show', body, this);
  }

  async getSavedEpisodes(options: PageOptions = {}): Promise<Page<SavedEpisode>> {
    this.requireScopes([SpotifyScope.UserLibraryRead]);
    const body = await this.get('me/episodes', this.pageQuery(options));
    return decodePage('saved-episode', body, this);
  }

  /**
   * libraryContains: whether each id is saved in the user's library, in input order.
   * Ids may be bare ids, URIs or open.spotify.com links. Requires user-library-read.
   */
  async libraryContains(type: LibraryType, ids: readonly string[]): Promise<boolean[]> {
    this.requireScopes([SpotifyScope.UserLibraryRead]);
    this.checkBulkSize(MAX_IDS_PER_REQUEST, ids.length);
    return chunkedRequest(MAX_IDS_PER_REQUEST, ids, async (chunk) => {
      const body = await this.get(`me/${type}/contains`, { ids: this.ids(LIBRARY_OBJECT_TYPES[type], chunk) });
      return parseBody(BooleanListSchema, body, `${type} contains response`);
    });
  }

  async isSaved(type: LibraryType, id: string): Promise<boolean> {
    const [saved] = await this.libraryContains(type, [id]);
    return saved;
  }

  async addToLibrary(type: LibraryType, ids: readonly string[]): Promise<void> {
    this.requireScopes([SpotifyScope.UserLibraryModify]);
    this.checkBulkSize(MAX_IDS_PER_REQUEST, ids.length);
    await chunkedAction(MAX_IDS_PER_REQUEST, ids, (chunk) =>
      this.put(`me/${type}`, { ids: this.ids(LIBRARY_OBJECT_TYPES[type], chunk) }),
    );
  }

  async removeFromLibrary(type: LibraryType, ids: readonly string[]): Promise<void> {
    this.requireScopes([SpotifyScope.UserLibraryModify]);
    this.checkBulkSize(MAX_IDS_PER_REQUEST, ids.length);
    await chunkedAction(MAX_IDS_PER_REQUEST, ids, (chunk) =>
      this.delete(`me/${type}`, { ids: this.ids(LIBRARY_OBJECT_TYPES[type], chunk) }),
    );
  }

  // ---------------------------------------------------------------------------
  // Personalization
  // ---------------------------------------------------------------------------

  async getTopArtists(options: Omit<PageOptions, 'market'> & { timeRange?: TimeRange } = {}): Promise<Page<Artist>> {
    this.requireScopes([SpotifyScope.UserTopRead]);
    const body = await this.get('me/top/artists', { ...this.pageQuery(options), time_range: options.timeRange });
    return decodePage('artist', body, this);
  }

  async getTopTracks(options: Omit<PageOptions, 'market'> & { timeRange?: TimeRange } = {}): Promise<Page<Track>> {
    this.requireScopes([SpotifyScope.UserTopRead]);
    const body = await this.get('me/top/tracks', { ...this.pageQuery(options), time_range: options.timeRange });
    return decodePage('track', body, this);
  }

  /** Recently played tracks, newest first. Forward-only cursor paging. */
  async getRecentlyPlayed(options: CursorOptions = {}): Promise<CursorPage<PlayHistory>> {
    this.requireScopes([SpotifyScope.UserReadRecentlyPlayed]);
    const body = await this.get('me/player/recently-played', this.cursorQuery(options));
    return decodeCursorPage('play-history', body, this);
  }

  // ---------------------------------------------------------------------------
  // Following
  // ---------------------------------------------------------------------------

  /** Artists the user follows. Forward-only cursor paging. Requires user-follow-read. */
  async getFollowedArtists(options: Omit<CursorOptions, 'before'> = {}): Promise<CursorPage<Artist>> {
    this.requireScopes([SpotifyScope.UserFollowRead]);
    const body = await this.get('me/following', { type: 'artist', ...this.cursorQuery(options) });
    return decodeCursorPage('artist', body, this);
  }

  isFollowingArtists(ids: readonly string[]): Promise<boolean[]> {
    return this.followingContains('artist', ids);
  }

  isFollowingUsers(ids: readonly string[]): Promise<boolean[]> {
    return this.followingContains('user', ids);
  }

  async isFollowingArtist(id: string): Promise<boolean> {
    const [following] = await this.isFollowingArtists([id]);
    return following;
  }

  async isFollowingUser(id: string): Promise<boolean> {
    const [following] = await this.isFollowingUsers([id]);
    return following;
  }

  /**
   * Whether `userId` (default: the token's own user) follows the playlist.
   * Private follows are only visible to their user with playlist-read-private.
   */
  async isFollowingPlaylist(playlist: string, userId?: string): Promise<boolean> {
    const user = userId === undefined ? (await this.getCurrentUserProfile()).id : toSpotifyId('user', userId);
    const body = await this.get(
      `playlists/${encodeURIComponent(toSpotifyId('playlist', playlist))}/followers/contains`,
      { ids: user },
    );
    return parseBody(SingleBooleanSchema, body, 'playlist followers response')[0];
  }

  followArtist(id: string): Promise<void> {
    return this.followArtists([id]);
  }

  unfollowArtist(id: string): Promise<void> {
    return this.unfollowArtists([id]);
  }

  followUser(id: string): Promise<void> {
    return this.followUsers([id]);
  }

  unfollowUser(id: string): Promise<void> {
    return this.unfollowUsers([id]);
  }

  followArtists(ids: readonly string[]): Promise<void> {
    return this.changeFollowing('PUT', 'artist', ids);
  }

  unfollowArtists(ids: readonly string[]): Promise<void> {
    return this.changeFollowing('DELETE', 'artist', ids);
  }

  followUsers(ids: readonly string[]): Promise<void> {
    return this.changeFollowing('PUT', 'user', ids);
  }

  unfollowUsers(ids: readonly string[]): Promise<void> {
    return this.changeFollowing('DELETE', 'user', ids);
  }

  /** Requires playlist-modify-public or playlist-modify-private. */
  async followPlaylist(playlist: string, followPublicly = true): Promise<void> {
    this.requireScopes([SpotifyScope.PlaylistModifyPublic, SpotifyScope.PlaylistModifyPrivate], true);
    await this.put(`playlists/${encodeURIComponent(toSpotifyId('playlist', playlist))}/followers`, undefined, {
      public: followPublicly,
    });
  }

  async unfollowPlaylist(playlist: string): Promise<void> {
    this.requireScopes([SpotifyScope.PlaylistModifyPublic, SpotifyScope.PlaylistModifyPrivate], true);
    await this.delete(`playlists/${encodeURIComponent(toSpotifyId('playlist', playlist))}/followers`);
  }

  private async followingContains(type: 'artist' | 'user', ids: readonly string[]): Promise<boolean[]> {
    this.requireScopes([SpotifyScope.UserFollowRead]);
    this.checkBulkSize(MAX_IDS_PER_REQUEST, ids.length);
    return chunkedRequest(MAX_IDS_PER_REQUEST, ids, async (chunk) => {
      const body = await this.get('me/following/contains', { type, ids: this.ids(type, chunk) });
      return parseBody(BooleanListSchema, body, 'following contains response');
    });
  }

  private async changeFollowing(method: 'PUT' | 'DELETE', type: 'artist' | 'user', ids: readonly string[]): Promise<void> {
    this.requireScopes([SpotifyScope.UserFollowModify]);
    this.checkBulkSize(MAX_IDS_PER_REQUEST, ids.length);
    await chunkedAction(MAX_IDS_PER_REQUEST, ids, async (chunk) => {
      const query = { type, ids: this.ids(type, chunk) };
      await (method === 'PUT' ? this.put('me/following', query) : this.delete('me/following', query));
    });
  }

  // ---------------------------------------------------------------------------
  // Episodes
  // ---------------------------------------------------------------------------

  /** A single episode, or null when Spotify does not know the id. */
  async getEpisode(id: string, market?: string): Promise<Episode | null> {
    try {
      const body = await this.get(`episodes/${encodeURIComponent(toSpotifyId('episode', id))}`, { market });
      return parseBody(EpisodeSchema, body, 'episode');
    } catch (error) {
      if (error instanceof RemoteRequestError && (error.statusCode === 404 || error.statusCode === 400)) {
        return null;
      }
      throw error;
    }
  }

  /** Episodes in input order; unknown ids yield null. Requires user-read-playback-position. */
  async getEpisodes(ids: readonly string[], market?: string): Promise<Array<Episode | null>> {
    this.requireScopes([SpotifyScope.UserReadPlaybackPosition]);
    this.checkBulkSize(MAX_IDS_PER_REQUEST, ids.length);
    return chunkedRequest(MAX_IDS_PER_REQUEST, ids, async (chunk) => {
      const body = await this.get('episodes', { ids: this.ids('episode', chunk), market });
      return parseBody(EpisodeListSchema, body, 'episode list').episodes;
    });
  }

  // ---------------------------------------------------------------------------
  // Albums and playlists
  // ---------------------------------------------------------------------------

  async getAlbumTracks(album: string, options: PageOptions = {}): Promise<Page<SimpleTrack>> {
    const body = await this.get(
      `albums/${encodeURIComponent(toSpotifyId('album', album))}/tracks`,
      this.pageQuery(options),
    );
    return decodePage('simple-track', body, this);
  }

  async getPlaylistTracks(playlist: string, options: PageOptions = {}): Promise<Page<PlaylistTrack>> {
    const body = await this.get(
      `playlists/${encodeURIComponent(toSpotifyId('playlist', playlist))}/tracks`,
      this.pageQuery(options),
    );
    return decodePage('playlist-track', body, this);
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private pageQuery(options: PageOptions): QueryParams {
    return {
      limit: options.limit ?? this.defaultLimit,
      offset: options.offset,
      market: options.market,
    };
  }

  private cursorQuery(options: CursorOptions): QueryParams {
    return {
      limit: options.limit ?? this.defaultLimit,
      after: options.after,
      before: options.before,
    };
  }
}
