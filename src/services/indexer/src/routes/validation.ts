/**
 * Request parsing helpers shared by the route modules.
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import { IndexerError } from '../errors';

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}

/**
 * Parse the JSON body against `schema`. A missing or malformed body is
 * treated as an empty object so optional-only schemas still pass.
 */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  const body: unknown = await c.req.json().catch(() => ({}));
  const parsed = schema.safeParse(body);
  if (!parsed.success) throw new IndexerError('invalid_request', describeIssues(parsed.error));
  return parsed.data;
}

export function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) throw new IndexerError('invalid_request', `Invalid id: ${raw}`);
  return id;
}
