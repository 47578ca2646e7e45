import { z } from 'zod';
import { ExternalUrlsSchema, ImageSchema } from './common.js';

export const SimpleShowSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.literal('show'),
  uri: z.string(),
  publisher: z.string(),
  description: z.string().optional(),
  total_episodes: z.number().optional(),
  images: z.array(ImageSchema).optional(),
  external_urls: ExternalUrlsSchema.optional(),
}).passthrough();

export type SimpleShow = z.infer<typeof SimpleShowSchema>;

export const SavedShowSchema = z.object({
  added_at: z.string(),
  show: SimpleShowSchema,
}).passthrough();

export type SavedShow = z.infer<typeof SavedShowSchema>;

export const EpisodeSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.literal('episode'),
  uri: z.string(),
  duration_ms: z.number(),
  release_date: z.string(),
  description: z.string().optional(),
  explicit: z.boolean().optional(),
  resume_point: z.object({
    fully_played: z.boolean(),
    resume_position_ms: z.number(),
  }).passthrough().optional(),
  show: SimpleShowSchema.optional(),
  images: z.array(ImageSchema).optional(),
}).passthrough();

export type Episode = z.infer<typeof EpisodeSchema>;

export const SavedEpisodeSchema = z.object({
  added_at: z.string(),
  episode: EpisodeSchema,
}).passthrough();

export type SavedEpisode = z.infer<typeof SavedEpisodeSchema>;

// GET /episodes?ids=...: unknown ids come back as null in their position
export const EpisodeListSchema = z.object({
  episodes: z.array(EpisodeSchema.nullable()),
});
