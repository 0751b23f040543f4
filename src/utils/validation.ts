import type { z } from 'zod';
import { ValidationError } from './error-handler.js';
import type { ValidationIssue } from '../types/index.js';

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Decode a value with a zod schema.
 * @param entity - Name used in the error message, e.g. "workflow"
 * @throws ValidationError listing every offending field path
 */
export function parseEntity<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  entity: string
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(entity, toValidationIssues(result.error));
  }
  return result.data;
}
