/**
 * common.ts: Zod schemas for fragments shared by several Spotify objects.
 *
 * Item schemas use .passthrough(): fields this library does not model are kept,
 * so a decoded item serializes back to the object the service sent.
 */

import { z } from 'zod';

export const ExternalUrlsSchema = z.record(z.string());

export const ImageSchema = z.object({
  url: z.string(),
  height: z.number().nullable().optional(),
  width: z.number().nullable().optional(),
}).passthrough();

export type Image = z.infer<typeof ImageSchema>;

export const FollowersSchema = z.object({
  href: z.string().nullable(),
  total: z.number(),
}).passthrough();

export const ExternalIdsSchema = z.object({
  isrc: z.string().optional(),
  ean: z.string().optional(),
  upc: z.string().optional(),
}).passthrough();
