import { z } from 'zod';
import { ExternalUrlsSchema, FollowersSchema, ImageSchema } from './common.js';

export const UserProfileSchema = z.object({
  id: z.string(),
  type: z.literal('user'),
  uri: z.string(),
  display_name: z.string().nullable(),
  email: z.string().optional(),
  country: z.string().optional(),
  product: z.string().optional(),
  followers: FollowersSchema.optional(),
  images: z.array(ImageSchema).optional(),
  external_urls: ExternalUrlsSchema.optional(),
}).passthrough();

export type UserProfile = z.infer<typeof UserProfileSchema>;
