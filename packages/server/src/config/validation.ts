/**
 * Configuration Validation
 */

import { invalidConfig } from '@mergington/core';
import type { ServerConfig } from './types.js';
import { MIN_PORT, MAX_PORT } from './defaults.js';

const PORT_EXPECTATION = `integer between ${MIN_PORT} and ${MAX_PORT}`;

export function isValidPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= MIN_PORT && value <= MAX_PORT;
}

export function validatePort(value: unknown): number {
  if (!isValidPort(value)) {
    throw invalidConfig('port', value, PORT_EXPECTATION);
  }
  return value;
}

/**
 * Parses a port from text (env var or CLI flag) and throws if invalid
 */
export function parsePort(value: string, field = 'port'): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw invalidConfig(field, value, PORT_EXPECTATION);
  }
  const port = parseInt(trimmed, 10);
  if (!isValidPort(port)) {
    throw invalidConfig(field, value, PORT_EXPECTATION);
  }
  return port;
}

export function validateHost(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw invalidConfig('host', value, 'non-empty string');
  }
  return value.trim();
}

export function validatePath(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw invalidConfig(field, value, 'non-empty path');
  }
  return value;
}

export function validateCorsOrigins(value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((origin): origin is string => typeof origin === 'string')) {
    throw invalidConfig('corsOrigins', value, 'list of origin strings');
  }
  return value;
}

/**
 * Validates a fully merged configuration and throws on the first bad value
 */
export function validateConfiguration(config: ServerConfig): ServerConfig {
  validatePort(config.port);
  validateHost(config.host);
  validatePath('staticDir', config.staticDir);
  if (config.seedFile !== undefined) {
    validatePath('seedFile', config.seedFile);
  }
  validateCorsOrigins(config.corsOrigins);
  return config;
}
