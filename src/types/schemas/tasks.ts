/**
 * Zod validation schemas for task forms
 *
 * Form fields arrive as strings; blank optional fields count as absent.
 * Cross-field date rules need the request time and live in
 * `validateTaskForm`.
 */

import { z } from 'zod';
import type { FieldErrors } from '../errors';
import { validationError } from '../errors';
import { Priority } from '../models';
import { handleZodError } from '../../utils/zod-error-handler';

export const MESSAGES = {
  id: 'Invalid ID.',
  name: 'Invalid name.',
  description: 'Invalid description.',
  startDate: 'Invalid start date.',
  endDate: 'Invalid end date.',
  priority: 'Invalid priority.',
  completed: 'Invalid completed flag.',
  dateOrder: 'Start date must be less than or equal to end date.',
  endDateInPast: 'End date must be greater than or equal to today.',
} as const;

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

/**
 * Required text that must contain something other than whitespace
 */
function requiredText(message: string) {
  return z
    .string({ required_error: message, invalid_type_error: message })
    .refine((value) => value.trim().length > 0, message);
}

function formDate(message: string) {
  return z.coerce.date({ errorMap: () => ({ message }) });
}

const TaskFieldsSchema = z.object({
  name: requiredText(MESSAGES.name),
  description: requiredText(MESSAGES.description),
  startDate: z.preprocess(blankToUndefined, formDate(MESSAGES.startDate).optional()),
  endDate: z.preprocess(blankToUndefined, formDate(MESSAGES.endDate)),
  priority: z.preprocess(
    blankToUndefined,
    z.nativeEnum(Priority, { errorMap: () => ({ message: MESSAGES.priority }) }).default(Priority.MEDIUM),
  ),
});

/**
 * Schema for creating a task
 */
export const CreateTaskSchema = TaskFieldsSchema;

/**
 * Schema for replacing a task's fields and image set
 */
export const UpdateTaskSchema = TaskFieldsSchema.extend({
  id: requiredText(MESSAGES.id),
  completed: z.preprocess(
    blankToUndefined,
    z.enum(['true', 'false'], { errorMap: () => ({ message: MESSAGES.completed }) })
      .transform((value) => value === 'true')
      .optional(),
  ),
});

export type CreateTaskInput = z.infer<typeof CreateTaskSchema>;
export type UpdateTaskInput = z.infer<typeof UpdateTaskSchema>;

/**
 * Midnight UTC of the day containing `now`
 */
export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

function addMessage(fields: FieldErrors, field: string, message: string): void {
  const messages = fields[field] ?? [];
  messages.push(message);
  fields[field] = messages;
}

/**
 * Parse a task form and apply the date rules relative to `now`
 * @throws AppError with VALIDATION_ERROR and the per-field map
 */
export function validateTaskForm<T extends CreateTaskInput>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  now: Date,
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw handleZodError(result.error);
  }

  const form = result.data;
  const fields: FieldErrors = {};
  if (form.startDate !== undefined && form.startDate.getTime() > form.endDate.getTime()) {
    addMessage(fields, 'startDate', MESSAGES.dateOrder);
  }
  if (form.endDate.getTime() < startOfUtcDay(now).getTime()) {
    addMessage(fields, 'endDate', MESSAGES.endDateInPast);
  }

  if (Object.keys(fields).length > 0) {
    throw validationError(fields);
  }
  return form;
}
