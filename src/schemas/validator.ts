import type { z } from 'zod';
import type { ValidationResult } from './types.js';

/**
 * Checks any document against any registered schema. Errors are flattened to
 * one line each so they can be fed back to the model verbatim.
 */
export function validateDocument<T>(data: unknown, schema: z.ZodType<T>): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, value: result.data };
  }

  const errors = result.error.issues.map(issue => {
    const path = issue.path.map(segment => String(segment)).join(' -> ');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  return { valid: false, errors };
}
