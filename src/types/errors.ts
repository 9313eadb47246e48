/**
 * API Error Types and Utilities
 */

export enum ErrorCode {
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  AUTH_FAILED = 'AUTH_FAILED',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  DEPENDENCY_ERROR = 'DEPENDENCY_ERROR',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  UNSUPPORTED_MEDIA_TYPE = 'UNSUPPORTED_MEDIA_TYPE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Per-field validation messages, keyed by request field name
 */
export type FieldErrors = Record<string, string[]>;

interface AppErrorDetails {
  fields?: FieldErrors;
  dependency?: 'blob-store' | 'identity-directory' | 'storage';
  operation?: string;
  limit?: number;
  cause?: unknown;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.AUTH_REQUIRED]: 401,
  [ErrorCode.AUTH_FAILED]: 401,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.DEPENDENCY_ERROR]: 500,
  [ErrorCode.PAYLOAD_TOO_LARGE]: 413,
  [ErrorCode.UNSUPPORTED_MEDIA_TYPE]: 415,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export class AppError extends Error {
  code: ErrorCode;
  details?: AppErrorDetails;

  constructor(code: ErrorCode, message: string, details?: AppErrorDetails) {
    super(message);
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
    this.name = 'AppError';
  }

  get statusCode(): number {
    return STATUS_BY_CODE[this.code];
  }

  toJSON(): { error: { code: string; message: string; details?: unknown } } {
    // Only field messages leave the process; the rest is for logs
    const fields = this.details?.fields;
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(fields && { details: { fields } }),
      },
    };
  }
}

export function validationError(fields: FieldErrors, message = 'One or more validation errors occurred.'): AppError {
  return new AppError(ErrorCode.VALIDATION_ERROR, message, { fields });
}

export function notFoundError(resource: string): AppError {
  return new AppError(ErrorCode.NOT_FOUND, `${resource} not found`);
}

export function dependencyError(
  dependency: NonNullable<AppErrorDetails['dependency']>,
  operation: string,
  cause: unknown,
): AppError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new AppError(ErrorCode.DEPENDENCY_ERROR, `${dependency} failed during ${operation}: ${reason}`, {
    dependency,
    operation,
    cause,
  });
}
