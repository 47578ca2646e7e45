export { SpotifyClient } from './SpotifyClient.js';
export type { LibraryType, TimeRange, PageOptions, CursorOptions } from './SpotifyClient.js';

export {
  Page,
  CursorPage,
  walkForward,
  walkBackward,
  collectForward,
  collectAll,
  flattenItems,
} from './paging.js';
export type {
  PagingRequester,
  PageData,
  CursorPageData,
  PageBinding,
  CursorPageBinding,
  Traversable,
} from './paging.js';

export {
  decodePage,
  decodeCursorPage,
  isOffsetItemKind,
  isCursorItemKind,
  assertOffsetItemKind,
  assertCursorItemKind,
} from './item-kinds.js';
export type { ItemKind, OffsetItemKind, CursorItemKind, OffsetItem, CursorItem } from './item-kinds.js';

export { requireScopes, checkBulkSize, chunk, chunkedRequest, chunkedAction } from './bulk.js';
export { SpotifyScope, isScope, parseScopes } from './scopes.js';
export type { Scope } from './scopes.js';
export { toSpotifyId } from './uri.js';
export type { SpotifyObjectType } from './uri.js';
export { sendWithRetry, backoffDelay, parseRetryAfter } from './rate-limit.js';
export type { RetryPolicy } from './rate-limit.js';

export {
  SpotifyError,
  MissingScopeError,
  TooManyIdentifiersError,
  UnsupportedDirectionError,
  UnrecognizedItemKindError,
  RemoteRequestError,
  RateLimitError,
  ParseError,
  InvalidUriError,
  ReadOnlyError,
} from './types.js';
export type { SpotifyClientOptions, SpotifyErrorCode, QueryParams } from './types.js';

export * from './schemas/index.js';
