/**
 * Environment Variable Configuration
 */

import { resolve } from 'node:path';
import { parseLogLevel } from '../utils/logger.js';
import type { PartialServerConfig } from './types.js';
import { EnvVars, FallbackEnvVars } from './types.js';
import { parsePort } from './validation.js';

/**
 * Reads a variable, treating the empty string as unset
 */
function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Splits a comma-separated list, dropping blanks
 */
export function parseEnvList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Loads configuration from environment variables. Relative paths resolve
 * against `cwd`.
 */
export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): PartialServerConfig {
  const config: PartialServerConfig = {};

  const port = readEnv(env, EnvVars.PORT) ?? readEnv(env, FallbackEnvVars.PORT);
  if (port !== undefined) {
    config.port = parsePort(port);
  }

  const host = readEnv(env, EnvVars.HOST) ?? readEnv(env, FallbackEnvVars.HOST);
  if (host !== undefined) {
    config.host = host;
  }

  const staticDir = readEnv(env, EnvVars.STATIC_DIR);
  if (staticDir !== undefined) {
    config.staticDir = resolve(cwd, staticDir);
  }

  const seedFile = readEnv(env, EnvVars.SEED_FILE);
  if (seedFile !== undefined) {
    config.seedFile = resolve(cwd, seedFile);
  }

  const corsOrigins = readEnv(env, EnvVars.CORS_ORIGINS);
  if (corsOrigins !== undefined) {
    config.corsOrigins = parseEnvList(corsOrigins);
  }

  // Unrecognized levels are left to the logger, which falls back to INFO
  const logLevel = parseLogLevel(readEnv(env, EnvVars.LOG_LEVEL));
  if (logLevel !== undefined) {
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Gets the config file path override from environment
 */
export function getEnvConfigPath(env: NodeJS.ProcessEnv = process.env): string | undefined {
  return readEnv(env, EnvVars.CONFIG);
}
