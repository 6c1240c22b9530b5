/**
 * Root and Health Routes
 */

import { Hono } from 'hono';
import { methodNotAllowed } from './errors.js';
import type { DirectoryServices } from './types.js';

/** Where GET / sends browsers */
export const INDEX_PAGE_PATH = '/static/index.html';

export function createRootRoutes(services: DirectoryServices) {
  const { directory } = services;
  const app = new Hono();

  // GET / -> 307 to the static page
  app.get('/', (c) => c.redirect(INDEX_PAGE_PATH, 307));
  app.all('/', methodNotAllowed('GET'));

  // GET /health
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      activities: directory.size,
    });
  });
  app.all('/health', methodNotAllowed('GET'));

  return app;
}
