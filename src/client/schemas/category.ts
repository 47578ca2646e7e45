import { z } from 'zod';
import { ImageSchema } from './common.js';

export const CategorySchema = z.object({
  id: z.string(),
  name: z.string(),
  href: z.string(),
  icons: z.array(ImageSchema),
}).passthrough();

export type Category = z.infer<typeof CategorySchema>;
