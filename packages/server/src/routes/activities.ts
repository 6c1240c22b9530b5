/**
 * Activities Routes Factory
 *
 * Listing activities and changing their rosters.
 */

import { Hono, type Context } from 'hono';
import { SignupStatus, missingRequiredField } from '@mergington/core';
import { createLogger } from '../utils/logger.js';
import { errorResponse, methodNotAllowed } from './errors.js';
import type { DirectoryServices, MessageResponse } from './types.js';

const logger = createLogger('activities');

/**
 * The email query parameter; when repeated, the last value wins
 */
function emailParam(c: Context): string {
  const email = c.req.queries('email')?.at(-1);
  if (email === undefined) {
    throw missingRequiredField('email');
  }
  return email;
}

export function createActivityRoutes(services: DirectoryServices) {
  const { directory } = services;
  const app = new Hono();

  /**
   * GET /activities
   * The full directory, keyed by activity name.
   */
  app.get('/activities', (c) => {
    return c.json(directory.listActivities());
  });
  app.all('/activities', methodNotAllowed('GET'));

  /**
   * POST /activities/:activityName/signup?email=...
   * Adds the email to the roster. Signing up twice is not an error.
   */
  app.post('/activities/:activityName/signup', (c) => {
    try {
      const activityName = c.req.param('activityName');
      const email = emailParam(c);

      const result = directory.signup(activityName, email);
      if (result.status === SignupStatus.REGISTERED) {
        logger.info(result.message);
      } else {
        logger.debug(`${email} already signed up for ${activityName}`);
      }

      const body: MessageResponse = { message: result.message };
      return c.json(body);
    } catch (error) {
      return errorResponse(c, error, logger, 'Failed to sign up');
    }
  });
  app.all('/activities/:activityName/signup', methodNotAllowed('POST'));

  /**
   * DELETE /activities/:activityName/remove?email=...
   * Removes the email from the roster.
   */
  app.delete('/activities/:activityName/remove', (c) => {
    try {
      const activityName = c.req.param('activityName');
      const email = emailParam(c);

      const result = directory.remove(activityName, email);
      logger.info(result.message);

      const body: MessageResponse = { message: result.message };
      return c.json(body);
    } catch (error) {
      return errorResponse(c, error, logger, 'Failed to remove participant');
    }
  });
  app.all('/activities/:activityName/remove', methodNotAllowed('DELETE'));

  return app;
}
