/**
 * Utility for handling Zod validation errors
 */

import type { z } from 'zod';
import type { AppError, FieldErrors } from '../types/errors';
import { validationError } from '../types/errors';

/**
 * Group a Zod error's issues by top-level field; form-level issues go under ''
 */
export function zodFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.errors) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : '';
    const messages = fields[field] ?? [];
    if (!messages.includes(issue.message)) {
      messages.push(issue.message);
    }
    fields[field] = messages;
  }
  return fields;
}

/**
 * Convert a Zod error into a VALIDATION_ERROR carrying the per-field map
 */
export function handleZodError(error: z.ZodError): AppError {
  return validationError(zodFieldErrors(error));
}
