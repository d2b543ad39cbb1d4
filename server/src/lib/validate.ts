import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Validates a request body against a Zod schema.
 * Returns the parsed data on success, or the issues on failure.
 */
export function validateBody<T extends z.ZodType>(
  schema: T,
  body: unknown,
): { success: true; data: z.infer<T> } | { success: false; issues: z.ZodIssue[] } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, issues: result.error.issues };
  }
  return { success: true, data: result.data };
}

/**
 * Parses a value at an engine boundary, throwing ValidationError instead of
 * letting a malformed record into the skill model.
 */
export function parseOrThrow<T extends z.ZodType>(schema: T, value: unknown, subject: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw ValidationError.fromZod(subject, result.error);
  }
  return result.data;
}
