/**
 * Tests for error types
 */

import {
  AppError,
  ErrorCode,
  dependencyError,
  notFoundError,
  validationError,
} from '../../src/types/errors';

describe('AppError', () => {
  it('should create error with code and message', () => {
    const error = new AppError(ErrorCode.AUTH_FAILED, 'Invalid or expired token');

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(ErrorCode.AUTH_FAILED);
    expect(error.message).toBe('Invalid or expired token');
    expect(error.name).toBe('AppError');
    expect(error.details).toBeUndefined();
  });

  it('should map codes to HTTP status codes', () => {
    expect(new AppError(ErrorCode.AUTH_REQUIRED, '').statusCode).toBe(401);
    expect(new AppError(ErrorCode.AUTH_FAILED, '').statusCode).toBe(401);
    expect(new AppError(ErrorCode.NOT_FOUND, '').statusCode).toBe(404);
    expect(new AppError(ErrorCode.VALIDATION_ERROR, '').statusCode).toBe(400);
    expect(new AppError(ErrorCode.PAYLOAD_TOO_LARGE, '').statusCode).toBe(413);
    expect(new AppError(ErrorCode.UNSUPPORTED_MEDIA_TYPE, '').statusCode).toBe(415);
    expect(new AppError(ErrorCode.DEPENDENCY_ERROR, '').statusCode).toBe(500);
    expect(new AppError(ErrorCode.INTERNAL_ERROR, '').statusCode).toBe(500);
  });

  it('should serialize to JSON without details', () => {
    expect(new AppError(ErrorCode.NOT_FOUND, 'Task not found').toJSON()).toEqual({
      error: { code: 'NOT_FOUND', message: 'Task not found' },
    });
  });

  it('should serialize field messages but not internal details', () => {
    const error = new AppError(ErrorCode.VALIDATION_ERROR, 'Bad form', {
      fields: { name: ['Invalid name.'] },
      cause: new Error('internal'),
    });

    expect(error.toJSON()).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Bad form',
        details: { fields: { name: ['Invalid name.'] } },
      },
    });
  });
});

describe('error helpers', () => {
  it('should build a validation error with the default message', () => {
    const error = validationError({ endDate: ['Invalid end date.'] });

    expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
    expect(error.message).toBe('One or more validation errors occurred.');
    expect(error.details?.fields).toEqual({ endDate: ['Invalid end date.'] });
  });

  it('should name the missing resource', () => {
    expect(notFoundError('Task').message).toBe('Task not found');
  });

  it('should describe a failed dependency call', () => {
    const cause = new Error('bucket missing');
    const error = dependencyError('blob-store', 'upload', cause);

    expect(error.code).toBe(ErrorCode.DEPENDENCY_ERROR);
    expect(error.message).toBe('blob-store failed during upload: bucket missing');
    expect(error.details).toEqual({ dependency: 'blob-store', operation: 'upload', cause });
  });
});
