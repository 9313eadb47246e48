/**
 * Error normalization and sanitization for HTTP responses
 *
 * Everything thrown inside a request ends up as an AppError. Messages of
 * server-side failures are scrubbed of paths, connection strings, tokens
 * and stack frames before they leave the process.
 */

import { AppError, ErrorCode } from '../types/errors';
import { StorageAdapterError } from '../storage/interfaces';

/**
 * Security-sensitive patterns that should be sanitized from error messages
 */
const SECURITY_PATTERNS = [
  // File paths and system paths
  /\/[a-zA-Z0-9_\-/.]+\.(json|js|ts|db|sqlite|yml|yaml|conf|config|env|key|pem)/,
  /[A-Z]:\\[a-zA-Z0-9_\-\\]+\.(json|js|ts|db|sqlite|yml|yaml|conf|config|env|key|pem)/,

  // Connection strings with credentials
  /[a-z][a-z0-9+.-]*:\/\/[^@\s/]+@[^\s]+/i,

  // Network details
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/,
  /Bearer\s+[a-zA-Z0-9\-_.]+/i,
  /\beyJ[a-zA-Z0-9\-_]+\.[a-zA-Z0-9\-_]+/,

  // Stack traces
  /at\s+[a-zA-Z_$][a-zA-Z0-9_$.]*\s*\([^)]*\)/,
  /:\d+:\d+\)/,
];

const STATUS_CODE_ERRORS: Record<number, ErrorCode> = {
  400: ErrorCode.VALIDATION_ERROR,
  401: ErrorCode.AUTH_FAILED,
  404: ErrorCode.NOT_FOUND,
  406: ErrorCode.VALIDATION_ERROR,
  413: ErrorCode.PAYLOAD_TOO_LARGE,
  415: ErrorCode.UNSUPPORTED_MEDIA_TYPE,
};

/**
 * Return the message unchanged unless it carries sensitive detail
 */
export function sanitizeMessage(message: string): string {
  if (SECURITY_PATTERNS.some((pattern) => pattern.test(message))) {
    return 'System error occurred';
  }
  return message;
}

export function hasStatusCode(error: unknown): error is { statusCode: number } {
  return error !== null && typeof error === 'object' && 'statusCode' in error && typeof error.statusCode === 'number';
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Normalize anything thrown while handling a request
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof StorageAdapterError) {
    return new AppError(ErrorCode.DEPENDENCY_ERROR, `Storage error: ${sanitizeMessage(error.message)}`, {
      dependency: 'storage',
      operation: error.code,
      cause: error,
    });
  }

  // Framework errors (body parsing, multipart limits) carry their HTTP status
  if (hasStatusCode(error)) {
    const code = STATUS_CODE_ERRORS[error.statusCode];
    if (code) {
      return new AppError(code, sanitizeMessage(messageOf(error)), { cause: error });
    }
  }

  return new AppError(ErrorCode.INTERNAL_ERROR, 'Internal server error', { cause: error });
}

/**
 * The body sent to the client; 5xx messages are sanitized again
 */
export function toResponseBody(error: AppError): ReturnType<AppError['toJSON']> {
  const body = error.toJSON();
  if (error.statusCode >= 500) {
    body.error.message = sanitizeMessage(body.error.message);
  }
  return body;
}
