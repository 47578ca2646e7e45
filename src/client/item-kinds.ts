/**
 * item-kinds.ts: Registry mapping an item-kind tag to the schema that decodes
 * a page's items.
 *
 * The decoder is looked up once, when the first page is decoded, and travels
 * with the page so its next/previous pages decode the same way. A tag that is
 * not registered for the requested paging style is a fatal
 * UnrecognizedItemKindError; there is no fallback decoding.
 */

import { z } from 'zod';
import { parseBody, unwrap } from './decode.js';
import { CursorPage, Page, type CursorPageData, type PageData, type PagingRequester } from './paging.js';
import {
  ArtistSchema,
  CategorySchema,
  CursorPagingEnvelopeSchema,
  PagingEnvelopeSchema,
  PlayHistorySchema,
  PlaylistTrackSchema,
  SavedAlbumSchema,
  SavedEpisodeSchema,
  SavedShowSchema,
  SavedTrackSchema,
  SimpleAlbumSchema,
  SimplePlaylistSchema,
  SimpleTrackSchema,
  TrackSchema,
} from './schemas/index.js';
import { UnrecognizedItemKindError } from './types.js';

const OFFSET_ITEM_SCHEMAS = {
  'track': TrackSchema,
  'simple-track': SimpleTrackSchema,
  'simple-album': SimpleAlbumSchema,
  'artist': ArtistSchema,
  'saved-track': SavedTrackSchema,
  'saved-album': SavedAlbumSchema,
  'saved-show': SavedShowSchema,
  'saved-episode': SavedEpisodeSchema,
  'playlist-track': PlaylistTrackSchema,
  'simple-playlist': SimplePlaylistSchema,
  'category': CategorySchema,
} as const;

const CURSOR_ITEM_SCHEMAS = {
  'artist': ArtistSchema,
  'play-history': PlayHistorySchema,
} as const;

// Key under which an endpoint may nest the page (search, browse, followed artists)
const WRAPPER_KEYS: Readonly<Record<string, string>> = {
  'artist': 'artists',
  'simple-album': 'albums',
  'simple-playlist': 'playlists',
  'category': 'categories',
};

export type OffsetItemKind = keyof typeof OFFSET_ITEM_SCHEMAS;
export type CursorItemKind = keyof typeof CURSOR_ITEM_SCHEMAS;
export type ItemKind = OffsetItemKind | CursorItemKind;

export type OffsetItem<K extends OffsetItemKind> = z.output<(typeof OFFSET_ITEM_SCHEMAS)[K]>;
export type CursorItem<K extends CursorItemKind> = z.output<(typeof CURSOR_ITEM_SCHEMAS)[K]>;

export function isOffsetItemKind(kind: string): kind is OffsetItemKind {
  return Object.hasOwn(OFFSET_ITEM_SCHEMAS, kind);
}

export function isCursorItemKind(kind: string): kind is CursorItemKind {
  return Object.hasOwn(CURSOR_ITEM_SCHEMAS, kind);
}

/** Narrows an untyped tag, e.g. one read from configuration or a tool argument. */
export function assertOffsetItemKind(kind: string): OffsetItemKind {
  if (!isOffsetItemKind(kind)) throw new UnrecognizedItemKindError(kind, 'offset');
  return kind;
}

export function assertCursorItemKind(kind: string): CursorItemKind {
  if (!isCursorItemKind(kind)) throw new UnrecognizedItemKindError(kind, 'cursor');
  return kind;
}

function offsetDecoder<S extends z.ZodTypeAny>(kind: string, schema: S): (body: unknown) => PageData<z.output<S>> {
  const items = z.array(schema);
  return (body) => {
    const envelope = parseBody(PagingEnvelopeSchema, unwrap(body, WRAPPER_KEYS[kind]), `${kind} page`);
    return { ...envelope, items: parseBody(items, envelope.items, `${kind} page items`) };
  };
}

function cursorDecoder<S extends z.ZodTypeAny>(kind: string, schema: S): (body: unknown) => CursorPageData<z.output<S>> {
  const items = z.array(schema);
  return (body) => {
    const { cursors, ...envelope } = parseBody(
      CursorPagingEnvelopeSchema,
      unwrap(body, WRAPPER_KEYS[kind]),
      `${kind} cursor page`,
    );
    return {
      ...envelope,
      cursor: cursors,
      items: parseBody(items, envelope.items, `${kind} cursor page items`),
    };
  };
}

/**
 * decodePage: builds an offset-based Page from a response body.
 *
 * @param kind       Selects the item schema; also used for every page reached from this one
 * @param requester  Fetches next/previous pages, normally the SpotifyClient
 */
export function decodePage<K extends OffsetItemKind>(
  kind: K,
  body: unknown,
  requester: PagingRequester,
): Page<OffsetItem<K>> {
  const itemKind = assertOffsetItemKind(kind);
  const decode = offsetDecoder(itemKind, OFFSET_ITEM_SCHEMAS[kind]);
  return new Page(decode(body), { itemKind, requester, decode });
}

/** decodeCursorPage: builds a forward-only CursorPage from a response body. */
export function decodeCursorPage<K extends CursorItemKind>(
  kind: K,
  body: unknown,
  requester: PagingRequester,
): CursorPage<CursorItem<K>> {
  const itemKind = assertCursorItemKind(kind);
  const decode = cursorDecoder(itemKind, CURSOR_ITEM_SCHEMAS[kind]);
  return new CursorPage(decode(body), { itemKind, requester, decode });
}
