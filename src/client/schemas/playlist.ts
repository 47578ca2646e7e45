/**
 * playlist.ts: Zod schemas for playlists and their entries.
 *
 * A playlist entry's track may be an episode, or null when the item was removed upstream.
 */

import { z } from 'zod';
import { ExternalUrlsSchema, ImageSchema } from './common.js';
import { EpisodeSchema } from './show.js';
import { TrackSchema } from './track.js';

export const PlaylistTrackSchema = z.object({
  added_at: z.string().nullable(),
  added_by: z.object({ id: z.string() }).passthrough().nullable().optional(),
  is_local: z.boolean(),
  track: z.union([TrackSchema, EpisodeSchema]).nullable(),
}).passthrough();

export type PlaylistTrack = z.infer<typeof PlaylistTrackSchema>;

export const SimplePlaylistSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.literal('playlist'),
  uri: z.string(),
  owner: z.object({
    id: z.string(),
    display_name: z.string().nullable().optional(),
  }).passthrough(),
  public: z.boolean().nullable(),
  collaborative: z.boolean(),
  snapshot_id: z.string().optional(),
  tracks: z.object({ href: z.string(), total: z.number() }).passthrough(),
  images: z.array(ImageSchema).nullable().optional(),
  external_urls: ExternalUrlsSchema.optional(),
}).passthrough();

export type SimplePlaylist = z.infer<typeof SimplePlaylistSchema>;
