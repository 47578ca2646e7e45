/**
 * paging.ts: Zod schemas for the two paging envelopes.
 *
 * Offset paging:  { href, items, limit, next, offset, previous, total }
 * Cursor paging:  { href, items, limit, next, cursors: { before, after }, total }
 *
 * Items stay unknown[] here; the item-kind registry parses them with the
 * matching item schema. The counter invariants are checked on the envelope:
 *   items.length <= limit
 *   offset + items.length <= total (offset paging, when total is present)
 */

import { z } from 'zod';

export const PagingEnvelopeSchema = z.object({
  href: z.string(),
  items: z.array(z.unknown()),
  limit: z.number().int().nonnegative(),
  next: z.string().nullable().optional().transform((v) => v ?? null),
  offset: z.number().int().nonnegative(),
  previous: z.string().nullable().optional().transform((v) => v ?? null),
  total: z.number().int().nonnegative().nullable().optional().transform((v) => v ?? null),
}).superRefine((page, ctx) => {
  if (page.items.length > page.limit) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['items'],
      message: `${page.items.length} items exceed limit ${page.limit}`,
    });
  }
  if (page.total !== null && page.offset + page.items.length > page.total) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['total'],
      message: `offset ${page.offset} + ${page.items.length} items exceed total ${page.total}`,
    });
  }
});

export type PagingEnvelope = z.output<typeof PagingEnvelopeSchema>;

export const CursorSchema = z.object({
  before: z.string().nullable().optional().transform((v) => v ?? null),
  after: z.string().nullable().optional().transform((v) => v ?? null),
});

export type Cursor = z.output<typeof CursorSchema>;

export const CursorPagingEnvelopeSchema = z.object({
  href: z.string(),
  items: z.array(z.unknown()),
  limit: z.number().int().nonnegative(),
  next: z.string().nullable().optional().transform((v) => v ?? null),
  cursors: CursorSchema.nullable().optional().transform((v) => v ?? { before: null, after: null }),
  total: z.number().int().nonnegative().nullable().optional().transform((v) => v ?? null),
}).superRefine((page, ctx) => {
  if (page.items.length > page.limit) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['items'],
      message: `${page.items.length} items exceed limit ${page.limit}`,
    });
  }
});

export type CursorPagingEnvelope = z.output<typeof CursorPagingEnvelopeSchema>;
