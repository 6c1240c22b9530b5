/**
 * Activity Type - extracurricular activity with a participant roster
 *
 * Activities are keyed by their human-readable name (case-sensitive, may contain
 * spaces). The roster is an ordered list of participant emails; uniqueness is
 * enforced by the directory's signup operation rather than by this type.
 */

import { invalidSeed } from '../errors/factories.js';

// ============================================================================
// Activity Interfaces
// ============================================================================

/**
 * In-memory activity record
 */
export interface Activity {
  /** Unique, case-sensitive activity name */
  readonly name: string;
  /** Free-text description */
  description: string;
  /** Free-text schedule, not parsed */
  schedule: string;
  /** Advertised capacity; reported but not enforced on signup */
  maxParticipants: number;
  /** Participant emails in signup order */
  participants: string[];
}

/**
 * Wire representation of an activity, as served by GET /activities
 * and as written in seed files
 */
export interface ActivityRecord {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/**
 * Full directory keyed by activity name
 */
export type ActivityCatalog = Record<string, ActivityRecord>;

// ============================================================================
// Conversion
// ============================================================================

/**
 * Converts an activity to its wire record. The roster is copied.
 */
export function toActivityRecord(activity: Activity): ActivityRecord {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.maxParticipants,
    participants: [...activity.participants],
  };
}

/**
 * Converts a wire record to an activity. The roster is copied.
 */
export function fromActivityRecord(name: string, record: ActivityRecord): Activity {
  return {
    name,
    description: record.description,
    schedule: record.schedule,
    maxParticipants: record.max_participants,
    participants: [...record.participants],
  };
}

/**
 * Deep copy of an activity
 */
export function cloneActivity(activity: Activity): Activity {
  return { ...activity, participants: [...activity.participants] };
}

// ============================================================================
// Validation Functions
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a capacity value
 */
export function isValidMaxParticipants(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validates one seed record and throws if invalid.
 * Rosters with a repeated email are rejected so the directory starts out
 * with unique participants.
 */
export function validateActivityRecord(name: string, value: unknown): ActivityRecord {
  if (!isPlainObject(value)) {
    throw invalidSeed(`activity "${name}" must be an object`, { activityName: name, value });
  }

  const { description, schedule, max_participants: maxParticipants, participants } = value;

  if (typeof description !== 'string') {
    throw invalidSeed(`activity "${name}" needs a string description`, {
      activityName: name,
      field: 'description',
    });
  }
  if (typeof schedule !== 'string') {
    throw invalidSeed(`activity "${name}" needs a string schedule`, {
      activityName: name,
      field: 'schedule',
    });
  }
  if (!isValidMaxParticipants(maxParticipants)) {
    throw invalidSeed(`activity "${name}" needs a positive integer max_participants`, {
      activityName: name,
      field: 'max_participants',
      value: maxParticipants,
    });
  }
  if (!Array.isArray(participants) || !participants.every((p): p is string => typeof p === 'string')) {
    throw invalidSeed(`activity "${name}" needs participants as a list of strings`, {
      activityName: name,
      field: 'participants',
    });
  }

  const seen = new Set<string>();
  for (const email of participants) {
    if (seen.has(email)) {
      throw invalidSeed(`activity "${name}" lists ${email} more than once`, {
        activityName: name,
        email,
      });
    }
    seen.add(email);
  }

  return {
    description,
    schedule,
    max_participants: maxParticipants,
    participants: [...participants],
  };
}

/**
 * Parses an untyped catalog (e.g. a decoded seed file) into activities,
 * preserving key order
 */
export function parseActivityCatalog(value: unknown): Activity[] {
  if (!isPlainObject(value)) {
    throw invalidSeed('expected a mapping of activity name to activity', { value });
  }

  const names = Object.keys(value);
  if (names.length === 0) {
    throw invalidSeed('no activities defined');
  }

  return names.map((name) => fromActivityRecord(name, validateActivityRecord(name, value[name])));
}
