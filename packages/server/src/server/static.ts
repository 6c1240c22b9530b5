/**
 * Static File Serving Middleware
 *
 * Serves files from a directory under a URL prefix (default `/static`).
 * Unknown files fall through to the app's not-found handler.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { resolve, extname, sep } from 'node:path';
import type { Hono } from 'hono';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('static');

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.js': 'application/javascript',
  '.mjs': 'application/javascript',
  '.css': 'text/css',
  '.json': 'application/json',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.txt': 'text/plain; charset=utf-8',
  '.webp': 'image/webp',
};

export function getContentType(filePath: string): string {
  return MIME_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

/**
 * Registers GET handling for `${prefix}/*` on a Hono app.
 * Does nothing when `staticDir` does not exist.
 *
 * @returns whether the middleware was registered
 */
export function registerStaticMiddleware(app: Hono, staticDir: string, prefix = '/static'): boolean {
  const root = resolve(staticDir);
  if (!existsSync(root)) {
    logger.warn(`Static directory ${root} does not exist; ${prefix}/* will not be served`);
    return false;
  }

  logger.info(`Serving ${prefix}/* from ${root}`);

  app.get(`${prefix}/*`, async (c, next) => {
    const relativePath = c.req.path.slice(prefix.length + 1);
    const filePath = resolve(root, relativePath);

    // Prevent directory traversal
    if (!filePath.startsWith(root + sep)) {
      await next();
      return;
    }

    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      await next();
      return;
    }

    const content = new Uint8Array(readFileSync(filePath));
    return c.body(content, 200, { 'Content-Type': getContentType(filePath) });
  });

  return true;
}
