import type { z } from 'zod';
import { ValidationError, type ErrorDetail } from '../errors.js';

export function toErrorDetails(error: z.ZodError): ErrorDetail[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parses `input` against `schema`. Throws a {@link ValidationError} listing every issue;
 * callers run this before touching the store.
 */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toErrorDetails(result.error));
  }
  return result.data;
}
