/**
 * track.ts: Zod schemas for Spotify tracks.
 *
 * SimpleTrackSchema   album track listings (no album, no popularity)
 * TrackSchema         full track
 * SavedTrackSchema    library entry: { added_at, track }
 *
 * Local files in playlists carry id: null, and their album and artists
 * have null ids and uris (see album.ts and artist.ts).
 */

import { z } from 'zod';
import { SimpleAlbumSchema } from './album.js';
import { SimpleArtistSchema } from './artist.js';
import { ExternalIdsSchema, ExternalUrlsSchema } from './common.js';

export const SimpleTrackSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.literal('track'),
  uri: z.string(),
  duration_ms: z.number(),
  explicit: z.boolean(),
  artists: z.array(SimpleArtistSchema),
  track_number: z.number().optional(),
  disc_number: z.number().optional(),
  is_local: z.boolean().optional(),
  is_playable: z.boolean().optional(),
  preview_url: z.string().nullable().optional(),
  external_urls: ExternalUrlsSchema.optional(),
}).passthrough();

export type SimpleTrack = z.infer<typeof SimpleTrackSchema>;

export const TrackSchema = SimpleTrackSchema.extend({
  album: SimpleAlbumSchema,
  popularity: z.number().optional(),
  external_ids: ExternalIdsSchema.optional(),
}).passthrough();

export type Track = z.infer<typeof TrackSchema>;

export const SavedTrackSchema = z.object({
  added_at: z.string(),
  track: TrackSchema,
}).passthrough();

export type SavedTrack = z.infer<typeof SavedTrackSchema>;
