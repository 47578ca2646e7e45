/**
 * schemas/index.ts: Re-exports all Spotify object schemas and TypeScript types.
 */

export { ImageSchema, FollowersSchema, ExternalIdsSchema, ExternalUrlsSchema } from './common.js';
export type { Image } from './common.js';

export { SimpleArtistSchema, ArtistSchema } from './artist.js';
export type { SimpleArtist, Artist } from './artist.js';

export { SimpleAlbumSchema, SavedAlbumSchema } from './album.js';
export type { SimpleAlbum, SavedAlbum } from './album.js';

export { SimpleTrackSchema, TrackSchema, SavedTrackSchema } from './track.js';
export type { SimpleTrack, Track, SavedTrack } from './track.js';

export {
  SimpleShowSchema,
  SavedShowSchema,
  EpisodeSchema,
  SavedEpisodeSchema,
  EpisodeListSchema,
} from './show.js';
export type { SimpleShow, SavedShow, Episode, SavedEpisode } from './show.js';

export { PlaylistTrackSchema, SimplePlaylistSchema } from './playlist.js';
export type { PlaylistTrack, SimplePlaylist } from './playlist.js';

export { CategorySchema } from './category.js';
export type { Category } from './category.js';

export { PlayHistorySchema, PlayContextSchema } from './play-history.js';
export type { PlayHistory } from './play-history.js';

export { UserProfileSchema } from './user.js';
export type { UserProfile } from './user.js';

export { PagingEnvelopeSchema, CursorPagingEnvelopeSchema, CursorSchema } from './paging.js';
export type { PagingEnvelope, CursorPagingEnvelope, Cursor } from './paging.js';
