/**
 * Zod error conversion tests
 */

import { z } from 'zod';
import { AppError, ErrorCode } from '../../src/types/errors';
import { handleZodError, zodFieldErrors } from '../../src/utils/zod-error-handler';

const schema = z
  .object({
    title: z.string().min(3, 'Too short').regex(/^[a-z]+$/, 'Lowercase only'),
    count: z.number({ invalid_type_error: 'Not a number' }),
  })
  .refine((value) => value.count > 0, 'Count must be positive');

describe('zodFieldErrors', () => {
  it('should group messages by top-level field', () => {
    const result = schema.safeParse({ title: 'A', count: 'x' });
    if (result.success) {
      throw new Error('Expected parse to fail');
    }

    expect(zodFieldErrors(result.error)).toEqual({
      title: ['Too short', 'Lowercase only'],
      count: ['Not a number'],
    });
  });

  it('should put form-level issues under an empty key', () => {
    const result = schema.safeParse({ title: 'abc', count: 0 });
    if (result.success) {
      throw new Error('Expected parse to fail');
    }

    expect(zodFieldErrors(result.error)).toEqual({ '': ['Count must be positive'] });
  });
});

describe('handleZodError', () => {
  it('should build a validation error with field messages', () => {
    const result = schema.safeParse({ title: 'abc', count: 'two' });
    if (result.success) {
      throw new Error('Expected parse to fail');
    }

    const error = handleZodError(result.error);
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(error.statusCode).toBe(400);
    expect(error.details?.fields).toEqual({ count: ['Not a number'] });
  });
});
