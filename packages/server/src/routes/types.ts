/**
 * Shared Types for Route Factories
 *
 * Route factories receive their services explicitly rather than reaching for
 * module state, so tests can hand each app its own directory.
 */

import type { ActivityCatalog, RemovalResult, SignupResult } from '@mergington/core';

/**
 * Subset of ActivityDirectory used by the routes
 */
export interface ActivityDirectoryLike {
  readonly size: number;
  listActivities(): ActivityCatalog;
  signup(activityName: string, email: string): SignupResult;
  remove(activityName: string, email: string): RemovalResult;
}

export interface DirectoryServices {
  directory: ActivityDirectoryLike;
}

/**
 * Body of a successful roster mutation
 */
export interface MessageResponse {
  message: string;
}

/**
 * Body of a 404 response
 */
export interface DetailResponse {
  detail: string;
}

/**
 * Body of a transport-level or unexpected failure
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
  };
}
