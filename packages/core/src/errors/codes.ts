/**
 * Error codes for the activity directory.
 * Categorized by error type for consistent handling.
 */

/**
 * Validation error codes - Input validation failures
 */
export const ValidationErrorCode = {
  /** General validation failure */
  INVALID_INPUT: 'INVALID_INPUT',
  /** Unknown or malformed command-line flags */
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  /** Required field or query parameter missing */
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',
  /** Seed data does not describe a valid activity set */
  INVALID_SEED: 'INVALID_SEED',
  /** Configuration value out of range or of the wrong type */
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;

export type ValidationErrorCode = typeof ValidationErrorCode[keyof typeof ValidationErrorCode];

/**
 * Not Found error codes - Resource not found
 */
export const NotFoundErrorCode = {
  /** Generic resource not found */
  NOT_FOUND: 'NOT_FOUND',
  /** No activity with the given name */
  ACTIVITY_NOT_FOUND: 'ACTIVITY_NOT_FOUND',
  /** Email is not on the activity's roster */
  PARTICIPANT_NOT_FOUND: 'PARTICIPANT_NOT_FOUND',
  /** Explicitly named config file does not exist */
  CONFIG_FILE_NOT_FOUND: 'CONFIG_FILE_NOT_FOUND',
} as const;

export type NotFoundErrorCode = typeof NotFoundErrorCode[keyof typeof NotFoundErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ValidationErrorCode,
  ...NotFoundErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Statuses a directory error can answer with
 */
export type DirectoryHttpStatus = 400 | 404;

/**
 * Status each error code is answered with over HTTP
 */
export const ErrorHttpStatus: Record<ErrorCode, DirectoryHttpStatus> = {
  // Validation errors -> 400
  [ErrorCode.INVALID_INPUT]: 400,
  [ErrorCode.INVALID_ARGUMENTS]: 400,
  [ErrorCode.MISSING_REQUIRED_FIELD]: 400,
  [ErrorCode.INVALID_SEED]: 400,
  [ErrorCode.INVALID_CONFIG]: 400,

  // Not Found errors -> 404
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ACTIVITY_NOT_FOUND]: 404,
  [ErrorCode.PARTICIPANT_NOT_FOUND]: 404,
  [ErrorCode.CONFIG_FILE_NOT_FOUND]: 404,
};

/**
 * CLI exit codes based on error category
 */
export const ErrorExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENTS: 2,
  NOT_FOUND: 3,
  VALIDATION: 4,
} as const;

export type ErrorExitCode = typeof ErrorExitCode[keyof typeof ErrorExitCode];

/**
 * Maps error codes to CLI exit codes
 */
export function getExitCode(code: ErrorCode): ErrorExitCode {
  if (code === ErrorCode.INVALID_ARGUMENTS) {
    return ErrorExitCode.INVALID_ARGUMENTS;
  }

  if (code in ValidationErrorCode) {
    return ErrorExitCode.VALIDATION;
  }

  if (code in NotFoundErrorCode) {
    return ErrorExitCode.NOT_FOUND;
  }

  return ErrorExitCode.GENERAL_ERROR;
}
