/**
 * Routes Index
 *
 * Re-exports all route factories.
 */

export { createActivityRoutes } from './activities.js';
export { createRootRoutes, INDEX_PAGE_PATH } from './root.js';
export {
  errorResponse,
  notFoundResponse,
  methodNotAllowed,
  NOT_FOUND_DETAIL,
  METHOD_NOT_ALLOWED_DETAIL,
} from './errors.js';
export type {
  ActivityDirectoryLike,
  DirectoryServices,
  MessageResponse,
  DetailResponse,
  ErrorResponse,
} from './types.js';
