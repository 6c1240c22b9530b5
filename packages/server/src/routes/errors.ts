/**
 * Error Responses
 *
 * Maps thrown errors to HTTP responses with the status the error carries:
 * - 404 `{ detail }` with the error's message
 * - 400 `{ error: { code, message } }`
 * - anything that is not a DirectoryError -> 500 `{ error: { code: 'INTERNAL_ERROR', message } }`, logged
 */

import type { Context, Handler } from 'hono';
import { isDirectoryError } from '@mergington/core';
import type { Logger } from '../utils/logger.js';
import type { DetailResponse, ErrorResponse } from './types.js';

export const NOT_FOUND_DETAIL = 'Not Found';
export const METHOD_NOT_ALLOWED_DETAIL = 'Method Not Allowed';

export function notFoundResponse(c: Context, detail: string): Response {
  const body: DetailResponse = { detail };
  return c.json(body, 404);
}

/**
 * Handler for a known path requested with a method it does not serve
 */
export function methodNotAllowed(...allowed: string[]): Handler {
  return (c) => {
    const body: DetailResponse = { detail: METHOD_NOT_ALLOWED_DETAIL };
    return c.json(body, 405, { Allow: allowed.join(', ') });
  };
}

export function errorResponse(c: Context, error: unknown, logger: Logger, fallbackMessage: string): Response {
  if (isDirectoryError(error)) {
    logger.debug(`${c.req.method} ${c.req.path}: ${error.message}`);
    if (error.httpStatus === 404) {
      return notFoundResponse(c, error.message);
    }
    const body: ErrorResponse = { error: { code: error.code, message: error.message } };
    return c.json(body, error.httpStatus);
  }

  logger.error(`${fallbackMessage}:`, error);
  const body: ErrorResponse = { error: { code: 'INTERNAL_ERROR', message: fallbackMessage } };
  return c.json(body, 500);
}
