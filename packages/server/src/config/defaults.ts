/**
 * Configuration Defaults
 *
 * Lowest-precedence values, overridden by file, env, and CLI.
 */

import { resolve } from 'node:path';
import type { ServerConfig } from './types.js';

export const DEFAULT_PORT = 8000;

export const DEFAULT_HOST = 'localhost';

/** Looked up in the working directory when no config path is given */
export const DEFAULT_CONFIG_FILE = 'activities.config.yaml';

export const DEFAULT_STATIC_DIR = 'static';

export const MIN_PORT = 1;

export const MAX_PORT = 65535;

export function getDefaultConfig(cwd: string = process.cwd()): ServerConfig {
  return {
    port: DEFAULT_PORT,
    host: DEFAULT_HOST,
    staticDir: resolve(cwd, DEFAULT_STATIC_DIR),
    corsOrigins: [],
  };
}
