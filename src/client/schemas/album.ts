import { z } from 'zod';
import { SimpleArtistSchema } from './artist.js';
import { ExternalUrlsSchema, ImageSchema } from './common.js';

// The album of a local file has null id, uri, album_type and release date fields
export const SimpleAlbumSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.literal('album'),
  uri: z.string().nullable(),
  album_type: z.string().nullable(),
  artists: z.array(SimpleArtistSchema),
  release_date: z.string().nullable(),
  release_date_precision: z.enum(['year', 'month', 'day']).nullable().optional(),
  total_tracks: z.number().optional(),
  images: z.array(ImageSchema).optional(),
  external_urls: ExternalUrlsSchema.optional(),
}).passthrough();

export type SimpleAlbum = z.infer<typeof SimpleAlbumSchema>;

export const SavedAlbumSchema = z.object({
  added_at: z.string(),
  album: SimpleAlbumSchema,
}).passthrough();

export type SavedAlbum = z.infer<typeof SavedAlbumSchema>;
