import { z } from 'zod';
import { TrackSchema } from './track.js';

export const PlayContextSchema = z.object({
  type: z.string(),
  uri: z.string(),
  href: z.string().nullable().optional(),
}).passthrough();

export const PlayHistorySchema = z.object({
  track: TrackSchema,
  played_at: z.string(),
  context: PlayContextSchema.nullable(),
}).passthrough();

export type PlayHistory = z.infer<typeof PlayHistorySchema>;
