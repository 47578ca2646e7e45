import { z } from 'zod';
import { ParseError } from './types.js';

/**
 * parseBody: validates a response body against a schema, raising ParseError
 * with the first few issues instead of a bare ZodError.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`Invalid ${what}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

const ObjectBodySchema = z.record(z.unknown());

/**
 * unwrap: some endpoints nest the page under a key, e.g. `{ "artists": { href, items, ... } }`.
 * Returns body[key] when the body is such a wrapper and body otherwise.
 */
export function unwrap(body: unknown, key: string | undefined): unknown {
  if (key === undefined) return body;
  const parsed = ObjectBodySchema.safeParse(body);
  if (!parsed.success || 'items' in parsed.data || !(key in parsed.data)) return body;
  return parsed.data[key];
}

const ErrorBodySchema = z.object({
  error: z.union([
    z.object({ status: z.number().optional(), message: z.string() }),
    z.string(),
  ]),
  error_description: z.string().optional(),
});

// Pulls Spotify's own error message out of an error response body, if there is one
export function errorMessageFrom(body: unknown): string | undefined {
  let value = body;
  if (typeof body === 'string') {
    try {
      value = JSON.parse(body);
    } catch {
      return body.length > 0 ? body.slice(0, 200) : undefined;
    }
  }
  const parsed = ErrorBodySchema.safeParse(value);
  if (!parsed.success) return undefined;
  const { error, error_description } = parsed.data;
  return typeof error === 'string' ? error_description ?? error : error.message;
}
