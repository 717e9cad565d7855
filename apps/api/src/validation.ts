import type { Context } from 'hono';
import type { z } from 'zod';
import { AppError, validationError } from './errors.js';

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => i.message).join(', ');
}

export async function parseJson<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw validationError('Request body must be valid JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw validationError(describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseQuery<S extends z.ZodTypeAny>(c: Context, schema: S): z.output<S> {
  const parsed = schema.safeParse(c.req.query());
  if (!parsed.success) {
    throw new AppError('VALIDATION_ERROR', describeIssues(parsed.error), 400, 'Check query parameters');
  }
  return parsed.data;
}
