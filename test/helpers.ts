import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { PagingRequester } from '../src/client/paging.js';
import { RemoteRequestError } from '../src/client/types.js';

/**
 * In-process stand-in for the request executor: serves canned bodies by URL
 * and records every URL it was asked for.
 */
export class FakeRequester implements PagingRequester {
  readonly requests: string[] = [];
  private readonly bodies: Map<string, unknown>;

  constructor(bodies: Record<string, unknown> = {}) {
    this.bodies = new Map(Object.entries(bodies));
  }

  async get(url: string): Promise<unknown> {
    this.requests.push(url);
    if (!this.bodies.has(url)) {
      throw new RemoteRequestError(`Spotify API 404: no stub for ${url}`, url, 404);
    }
    return this.bodies.get(url);
  }
}

export function simpleArtist(id: string) {
  return {
    id,
    name: `Artist ${id}`,
    type: 'artist',
    uri: `spotify:artist:${id}`,
  };
}

export function simpleTrack(id: string) {
  return {
    id,
    name: `Track ${id}`,
    type: 'track',
    uri: `spotify:track:${id}`,
    duration_ms: 180000,
    explicit: false,
    artists: [simpleArtist('a1')],
  };
}

export function fullTrack(id: string) {
  return {
    ...simpleTrack(id),
    album: {
      id: 'al1',
      name: 'Album al1',
      type: 'album',
      uri: 'spotify:album:al1',
      album_type: 'album',
      artists: [simpleArtist('a1')],
      release_date: '2021-05-01',
    },
    popularity: 40,
  };
}

export function fullArtist(id: string) {
  return {
    ...simpleArtist(id),
    genres: ['ambient'],
    popularity: 55,
  };
}

export interface TrackPageLinks {
  href?: string;
  next?: string | null;
  previous?: string | null;
  total?: number | null;
}

/** Body of an offset page holding simple tracks `t<offset>` and `t<offset + 1>`. */
export function trackPageBody(offset: number, links: TrackPageLinks = {}) {
  return {
    href: links.href ?? `/x?offset=${offset}`,
    items: [simpleTrack(`t${offset}`), simpleTrack(`t${offset + 1}`)],
    limit: 2,
    offset,
    total: links.total ?? null,
    next: links.next ?? null,
    previous: links.previous ?? null,
  };
}

/**
 * Bodies for an offset-paged collection of `pageCount` pages of two simple
 * tracks each, keyed by their hrefs `/x?offset=0`, `/x?offset=2`, ...
 */
export function trackPages(pageCount: number): Record<string, unknown> {
  const bodies: Record<string, unknown> = {};
  for (let i = 0; i < pageCount; i++) {
    const offset = i * 2;
    bodies[`/x?offset=${offset}`] = trackPageBody(offset, {
      total: pageCount * 2,
      next: i < pageCount - 1 ? `/x?offset=${offset + 2}` : null,
      previous: i > 0 ? `/x?offset=${offset - 2}` : null,
    });
  }
  return bodies;
}

export function savedTrack(id: string, addedAt = '2024-01-01T00:00:00Z') {
  return { added_at: addedAt, track: fullTrack(id) };
}

export function userProfile(id: string) {
  return {
    id,
    type: 'user',
    uri: `spotify:user:${id}`,
    display_name: `User ${id}`,
    country: 'NL',
    product: 'premium',
  };
}

export function loadFixture(name: string): Record<string, unknown> {
  const path = fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
  return JSON.parse(readFileSync(path, 'utf8'));
}

export function simpleAlbum(id: string) {
  return {
    id,
    name: `Album ${id}`,
    type: 'album',
    uri: `spotify:album:${id}`,
    album_type: 'album',
    artists: [simpleArtist('a1')],
    release_date: '2020-02-14',
    release_date_precision: 'day',
  };
}

export function simpleShow(id: string) {
  return {
    id,
    name: `Show ${id}`,
    type: 'show',
    uri: `spotify:show:${id}`,
    publisher: 'Test Publisher',
  };
}

export function episode(id: string) {
  return {
    id,
    name: `Episode ${id}`,
    type: 'episode',
    uri: `spotify:episode:${id}`,
    duration_ms: 1_800_000,
    release_date: '2024-04-01',
  };
}

export function simplePlaylist(id: string) {
  return {
    id,
    name: `Playlist ${id}`,
    type: 'playlist',
    uri: `spotify:playlist:${id}`,
    owner: { id: 'user1', display_name: 'User user1' },
    public: true,
    collaborative: false,
    tracks: { href: `https://api.spotify.com/v1/playlists/${id}/tracks`, total: 3 },
  };
}

export function category(id: string) {
  return {
    id,
    name: `Category ${id}`,
    href: `https://api.spotify.com/v1/browse/categories/${id}`,
    icons: [],
  };
}

export function playlistTrack(id: string) {
  return { added_at: '2024-05-01T10:00:00Z', added_by: { id: 'user1' }, is_local: false, track: fullTrack(id) };
}

export function playHistory(id: string, playedAt: string) {
  return { track: fullTrack(id), played_at: playedAt, context: null };
}

/** A playlist entry for a file from the user's own disk, as Spotify returns it. */
export function localPlaylistTrack() {
  return {
    added_at: '2024-05-02T09:15:00Z',
    added_by: { id: 'user1' },
    is_local: true,
    track: {
      id: null,
      name: 'Demo Take 3',
      type: 'track',
      uri: 'spotify:local:Garage+Band:Demos:Demo+Take+3:201',
      duration_ms: 201000,
      explicit: false,
      is_local: true,
      popularity: 0,
      preview_url: null,
      disc_number: 0,
      track_number: 0,
      external_ids: {},
      external_urls: {},
      album: {
        id: null,
        name: 'Demos',
        type: 'album',
        uri: null,
        href: null,
        album_type: null,
        artists: [],
        available_markets: [],
        external_urls: {},
        images: [],
        release_date: null,
        release_date_precision: null,
      },
      artists: [{ id: null, name: 'Garage Band', type: 'artist', uri: null, href: null, external_urls: {} }],
    },
  };
}

/**
 * Bodies of a two-page offset collection with one item per page, keyed by
 * href `/<path>?offset=0` and `/<path>?offset=1`.
 */
export function singleItemPages(path: string, items: readonly [unknown, unknown]): Record<string, unknown> {
  return {
    [`/${path}?offset=0`]: {
      href: `/${path}?offset=0`,
      items: [items[0]],
      limit: 1,
      offset: 0,
      total: 2,
      next: `/${path}?offset=1`,
      previous: null,
    },
    [`/${path}?offset=1`]: {
      href: `/${path}?offset=1`,
      items: [items[1]],
      limit: 1,
      offset: 1,
      total: 2,
      next: null,
      previous: `/${path}?offset=0`,
    },
  };
}
