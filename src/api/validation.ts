import type { Context } from 'hono';
import type { z } from 'zod';
import { ValidationError, errorMessage } from '../utils/errors.js';

export function zodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/** Reads the JSON body and validates it; failures surface as ValidationError (400). */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (error) {
    throw new ValidationError(`Request body must be valid JSON: ${errorMessage(error)}`);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = zodIssues(result.error);
    throw new ValidationError('Invalid request body', issues);
  }
  return result.data;
}
