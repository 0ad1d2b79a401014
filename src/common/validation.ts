/**
 * Request validation helpers (zod)
 */

import type { ZodError, ZodTypeAny, output } from 'zod';
import { ValidationError, type FieldError } from './errors.js';

export function toFieldErrors(error: ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Parse input against a schema or throw a ValidationError with one entry
 * per offending field.
 */
export function parseOrThrow<S extends ZodTypeAny>(schema: S, input: unknown): output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toFieldErrors(result.error));
  }
  return result.data;
}
