/**
 * Error handling module
 *
 * Provides structured errors with codes, messages, and details
 * for consistent handling across the directory, HTTP, and CLI layers.
 */

// Error codes
export {
  ErrorCode,
  ValidationErrorCode,
  NotFoundErrorCode,
  ErrorHttpStatus,
  ErrorExitCode,
  getExitCode,
  type DirectoryHttpStatus,
} from './codes.js';

// Error classes
export {
  DirectoryError,
  ValidationError,
  NotFoundError,
  isDirectoryError,
  isValidationError,
  isNotFoundError,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Not Found
  activityNotFound,
  participantNotFound,
  configFileNotFound,
  // Validation
  invalidArguments,
  missingRequiredField,
  invalidSeed,
  invalidConfig,
} from './factories.js';
