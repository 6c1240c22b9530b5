/**
 * Node.js Listener
 *
 * Bridges `node:http` requests to a Hono app's fetch handler.
 */

import { createServer, type IncomingMessage, type Server } from 'node:http';
import type { Hono } from 'hono';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('server');

export interface ListenOptions {
  port: number;
  host: string;
}

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

/**
 * Converts a Node request to a fetch Request
 */
export async function toFetchRequest(req: IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (value) headers.set(key, Array.isArray(value) ? value.join(', ') : value);
  }

  const method = req.method ?? 'GET';
  const hasBody = !['GET', 'HEAD'].includes(method);
  const body = hasBody ? await readBody(req) : undefined;

  return new Request(new URL(req.url ?? '/', origin), {
    method,
    headers,
    body: body && body.length > 0 ? new Uint8Array(body) : undefined,
  });
}

/**
 * Starts an HTTP server for the app and resolves once it is listening.
 * The resolved port is the bound one, so `port: 0` picks a free port.
 */
export function listen(app: Hono, options: ListenOptions): Promise<Server> {
  const server = createServer((req, res) => {
    const origin = `http://${req.headers.host ?? `${options.host}:${options.port}`}`;

    toFetchRequest(req, origin)
      .then((request) => app.fetch(request))
      .then(async (response) => {
        res.writeHead(response.status, Object.fromEntries(response.headers.entries()));
        const arrayBuffer = await response.arrayBuffer();
        res.end(Buffer.from(arrayBuffer));
      })
      .catch((err: unknown) => {
        logger.error('Request error:', err);
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end('Internal Server Error');
      });
  });

  return new Promise<Server>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export function boundPort(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
