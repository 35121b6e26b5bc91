import type { Context } from 'hono';
import type { z } from 'zod';
import { SourceError } from '../shared/errors.js';

/**
 * Read the request body as JSON and validate it. An unreadable or invalid
 * body is a SourceError, which the app maps to 400.
 */
export async function readBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  let raw: unknown;
  try {
    raw = await c.req.json<unknown>();
  } catch (err) {
    throw new SourceError('Request body must be valid JSON', {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new SourceError('Invalid request body', { errors: parsed.error.flatten().fieldErrors });
  }
  return parsed.data;
}

/**
 * Parse a non-negative integer query parameter, falling back when absent.
 */
export function intQuery(value: string | undefined, fallback: number, max = 500): number {
  if (value === undefined) return fallback;
  const n = Number.parseInt(value, 10);
  if (!Number.isFinite(n) || n < 0) {
    throw new SourceError(`Expected a non-negative integer, got "${value}"`);
  }
  return Math.min(n, max);
}
