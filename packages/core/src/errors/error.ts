import {
  ErrorCode,
  ErrorHttpStatus,
  ValidationErrorCode,
  NotFoundErrorCode,
  type DirectoryHttpStatus,
} from './codes.js';

/**
 * Context attached to an error for logs and callers
 */
export interface ErrorDetails {
  field?: string;
  value?: unknown;
  expected?: unknown;
  /** Activity the operation targeted */
  activityName?: string;
  /** Participant email the operation targeted */
  email?: string;
  [key: string]: unknown;
}

/**
 * Root of the directory's error hierarchy. The HTTP layer answers with
 * `httpStatus`; the process entry exits with `getExitCode(code)`.
 */
export class DirectoryError extends Error {
  readonly code: ErrorCode;
  readonly details: ErrorDetails;
  readonly httpStatus: DirectoryHttpStatus;

  constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: Error) {
    super(message, { cause });
    this.name = 'DirectoryError';
    this.code = code;
    this.details = details;
    this.httpStatus = ErrorHttpStatus[code];
  }
}

/**
 * Rejected input: query parameters, seed data, configuration, flags
 */
export class ValidationError extends DirectoryError {
  constructor(
    message: string,
    code: ValidationErrorCode = ErrorCode.INVALID_INPUT,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ValidationError';
  }
}

/**
 * A named activity, participant or file that does not exist
 */
export class NotFoundError extends DirectoryError {
  constructor(
    message: string,
    code: NotFoundErrorCode = ErrorCode.NOT_FOUND,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'NotFoundError';
  }
}

export function isDirectoryError(error: unknown): error is DirectoryError {
  return error instanceof DirectoryError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
