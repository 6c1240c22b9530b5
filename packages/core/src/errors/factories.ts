import { ErrorCode } from './codes.js';
import { ValidationError, NotFoundError, type ErrorDetails } from './error.js';

// =============================================================================
// Not Found Factories
// =============================================================================

/**
 * Creates a NotFoundError for an activity name that is not in the directory.
 * The message is returned verbatim to HTTP clients.
 */
export function activityNotFound(activityName: string, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError('Activity not found', ErrorCode.ACTIVITY_NOT_FOUND, {
    activityName,
    ...details,
  });
}

/**
 * Creates a NotFoundError for an email that is not on an activity's roster.
 * The message is returned verbatim to HTTP clients.
 */
export function participantNotFound(
  activityName: string,
  email: string,
  details: ErrorDetails = {}
): NotFoundError {
  return new NotFoundError('Participant not found in this activity', ErrorCode.PARTICIPANT_NOT_FOUND, {
    activityName,
    email,
    ...details,
  });
}

export function configFileNotFound(path: string, details: ErrorDetails = {}): NotFoundError {
  return new NotFoundError(`Config file not found: ${path}`, ErrorCode.CONFIG_FILE_NOT_FOUND, {
    value: path,
    ...details,
  });
}

// =============================================================================
// Validation Factories
// =============================================================================

/**
 * Creates a ValidationError for command-line flags that cannot be parsed
 */
export function invalidArguments(reason: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(`Invalid arguments: ${reason}`, ErrorCode.INVALID_ARGUMENTS, details);
}

/**
 * Creates a ValidationError for a missing required field
 */
export function missingRequiredField(field: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(`Missing required field: ${field}`, ErrorCode.MISSING_REQUIRED_FIELD, {
    field,
    ...details,
  });
}

/**
 * Creates a ValidationError for seed data that cannot become a directory
 */
export function invalidSeed(reason: string, details: ErrorDetails = {}): ValidationError {
  return new ValidationError(`Invalid activity seed: ${reason}`, ErrorCode.INVALID_SEED, details);
}

export function invalidConfig(
  field: string,
  value: unknown,
  expected: string,
  details: ErrorDetails = {}
): ValidationError {
  return new ValidationError(
    `Invalid configuration value for ${field}: ${truncateValue(value)} (expected ${expected})`,
    ErrorCode.INVALID_CONFIG,
    {
      field,
      value,
      expected,
      ...details,
    }
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  const str = typeof value === 'string' ? value : JSON.stringify(value);
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}
