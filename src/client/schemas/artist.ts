/**
 * artist.ts: Zod schemas for Spotify artists.
 *
 * SimpleArtistSchema appears nested in tracks and albums;
 * ArtistSchema is the full object returned by top-artists and followed-artists.
 */

import { z } from 'zod';
import { ExternalUrlsSchema, FollowersSchema, ImageSchema } from './common.js';

// Artists of local files carry no id, uri or href
export const SimpleArtistSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.literal('artist'),
  uri: z.string().nullable(),
  href: z.string().nullable().optional(),
  external_urls: ExternalUrlsSchema.optional(),
}).passthrough();

export type SimpleArtist = z.infer<typeof SimpleArtistSchema>;

export const ArtistSchema = SimpleArtistSchema.extend({
  id: z.string(),
  uri: z.string(),
  genres: z.array(z.string()),
  popularity: z.number(),
  followers: FollowersSchema.optional(),
  images: z.array(ImageSchema).optional(),
}).passthrough();

export type Artist = z.infer<typeof ArtistSchema>;
