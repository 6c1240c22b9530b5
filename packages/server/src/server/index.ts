/**
 * Activity Directory Server
 *
 * HTTP server for the activity directory, built with Hono.
 *
 * Exports `createActivitiesApp` (builds the Hono app around a directory) and
 * `startActivitiesServer` (creates the app and starts listening on Node.js).
 */

import type { Server } from 'node:http';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { ActivityDirectory, createActivityDirectory } from '@mergington/core';
import { createActivityRoutes, createRootRoutes, errorResponse, notFoundResponse, NOT_FOUND_DETAIL } from '../routes/index.js';
import { DEFAULT_HOST, DEFAULT_PORT } from '../config/defaults.js';
import { createLogger } from '../utils/logger.js';
import { registerStaticMiddleware } from './static.js';
import { boundPort, closeServer, listen } from './node.js';

const logger = createLogger('server');

// ============================================================================
// Options & Return Types
// ============================================================================

export interface ActivitiesAppOptions {
  /** Directory to serve; a fresh one from the built-in seed when omitted */
  directory?: ActivityDirectory;
  /** Directory served under /static; nothing is served when omitted */
  staticDir?: string;
  /** Origins allowed by CORS; no CORS headers when omitted or empty */
  corsOrigins?: string[];
}

export interface ActivitiesApp {
  app: Hono;
  directory: ActivityDirectory;
}

export interface ActivitiesServerOptions extends ActivitiesAppOptions {
  port?: number;
  host?: string;
}

export interface ActivitiesServer extends ActivitiesApp {
  server: Server;
  /** Bound port (differs from the requested one when that was 0) */
  port: number;
  host: string;
  close(): Promise<void>;
}

// ============================================================================
// createActivitiesApp
// ============================================================================

export function createActivitiesApp(options: ActivitiesAppOptions = {}): ActivitiesApp {
  const directory = options.directory ?? createActivityDirectory();
  const app = new Hono();

  const corsOrigins = options.corsOrigins ?? [];
  if (corsOrigins.length > 0) {
    app.use(
      '*',
      cors({
        origin: corsOrigins,
        allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
        allowHeaders: ['Content-Type'],
      })
    );
  }

  app.route('/', createRootRoutes({ directory }));
  app.route('/', createActivityRoutes({ directory }));

  if (options.staticDir) {
    registerStaticMiddleware(app, options.staticDir);
  }

  app.notFound((c) => notFoundResponse(c, NOT_FOUND_DETAIL));
  app.onError((error, c) => errorResponse(c, error, logger, 'Internal Server Error'));

  return { app, directory };
}

// ============================================================================
// startActivitiesServer
// ============================================================================

export async function startActivitiesServer(options: ActivitiesServerOptions = {}): Promise<ActivitiesServer> {
  const activitiesApp = createActivitiesApp(options);
  const host = options.host ?? DEFAULT_HOST;

  const server = await listen(activitiesApp.app, { port: options.port ?? DEFAULT_PORT, host });
  const port = boundPort(server);

  logger.info(`Listening on http://${host}:${port} (${activitiesApp.directory.size} activities)`);

  return {
    ...activitiesApp,
    server,
    port,
    host,
    async close() {
      await closeServer(server);
      logger.info('Server stopped');
    },
  };
}
