/**
 * Activity Directory
 *
 * Owns the in-memory activity set for the lifetime of a process. The set of
 * activity names is fixed at construction; only rosters change.
 *
 * Mutations are synchronous: the membership check and the roster write run
 * without yielding to the event loop, so each signup or removal is atomic
 * with respect to every other request. Reads hand out copies, never the
 * live roster arrays.
 */

import { activityNotFound, participantNotFound, invalidSeed } from '../errors/factories.js';
import {
  cloneActivity,
  toActivityRecord,
  type Activity,
  type ActivityCatalog,
  type ActivityRecord,
} from '../types/activity.js';
import { DEFAULT_ACTIVITIES } from './seed.js';

// ============================================================================
// Result Types
// ============================================================================

export const SignupStatus = {
  REGISTERED: 'registered',
  ALREADY_REGISTERED: 'already_registered',
} as const;

export type SignupStatus = typeof SignupStatus[keyof typeof SignupStatus];

export interface SignupResult {
  status: SignupStatus;
  message: string;
}

export interface RemovalResult {
  message: string;
}

export const ALREADY_REGISTERED_MESSAGE = 'Student already signed up for this activity';

// ============================================================================
// ActivityDirectory
// ============================================================================

export class ActivityDirectory {
  private readonly activities = new Map<string, Activity>();

  /**
   * @param seed - Initial activities; copied, so later changes to the seed
   * objects do not reach the directory
   */
  constructor(seed: readonly Activity[] = DEFAULT_ACTIVITIES) {
    for (const activity of seed) {
      if (this.activities.has(activity.name)) {
        throw invalidSeed(`activity "${activity.name}" is defined more than once`, {
          activityName: activity.name,
        });
      }
      this.activities.set(activity.name, cloneActivity(activity));
    }
  }

  /** Number of activities */
  get size(): number {
    return this.activities.size;
  }

  has(activityName: string): boolean {
    return this.activities.has(activityName);
  }

  /**
   * Snapshot of the whole directory, keyed by activity name in seed order
   */
  listActivities(): ActivityCatalog {
    return Object.fromEntries(
      Array.from(this.activities.values(), (activity): [string, ActivityRecord] => [activity.name, toActivityRecord(activity)])
    );
  }

  /**
   * Snapshot of one activity, or undefined when the name is unknown
   */
  getActivity(activityName: string): Activity | undefined {
    const activity = this.activities.get(activityName);
    return activity ? cloneActivity(activity) : undefined;
  }

  /**
   * Adds `email` to the end of the activity's roster.
   *
   * Signing up an email that is already on the roster succeeds without
   * changing anything. Capacity is not checked and the email is not validated.
   *
   * @throws NotFoundError (ACTIVITY_NOT_FOUND) for an unknown activity
   */
  signup(activityName: string, email: string): SignupResult {
    const activity = this.requireActivity(activityName);

    if (activity.participants.includes(email)) {
      return { status: SignupStatus.ALREADY_REGISTERED, message: ALREADY_REGISTERED_MESSAGE };
    }

    activity.participants.push(email);
    return { status: SignupStatus.REGISTERED, message: `Signed up ${email} for ${activityName}` };
  }

  /**
   * Removes `email` from the activity's roster.
   *
   * @throws NotFoundError (ACTIVITY_NOT_FOUND) for an unknown activity
   * @throws NotFoundError (PARTICIPANT_NOT_FOUND) when the email is not on the roster
   */
  remove(activityName: string, email: string): RemovalResult {
    const activity = this.requireActivity(activityName);

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      throw participantNotFound(activityName, email);
    }

    activity.participants.splice(index, 1);
    return { message: `Removed ${email} from ${activityName}` };
  }

  private requireActivity(activityName: string): Activity {
    const activity = this.activities.get(activityName);
    if (!activity) {
      throw activityNotFound(activityName);
    }
    return activity;
  }
}

/**
 * Creates a directory from the given activities, or from the built-in seed
 */
export function createActivityDirectory(seed?: readonly Activity[]): ActivityDirectory {
  return new ActivityDirectory(seed);
}
