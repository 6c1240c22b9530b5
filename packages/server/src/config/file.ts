/**
 * Configuration File Handling
 *
 * Discovers and parses the YAML config file. Keys are snake_case in the file
 * and camelCase in memory. Relative paths in the file resolve against the
 * file's own directory.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as yaml from 'yaml';
import { ValidationError, ErrorCode, configFileNotFound, invalidConfig } from '@mergington/core';
import { parseLogLevel } from '../utils/logger.js';
import type { ConfigFileDiscovery, PartialServerConfig, YamlConfigFile } from './types.js';
import { DEFAULT_CONFIG_FILE } from './defaults.js';
import { validateCorsOrigins, validateHost, validatePath, validatePort } from './validation.js';

// ============================================================================
// Discovery
// ============================================================================

/**
 * Picks the config file location: the override when given, else
 * `activities.config.yaml` in `cwd`
 */
export function discoverConfigFile(
  overridePath?: string,
  cwd: string = process.cwd()
): ConfigFileDiscovery {
  if (overridePath) {
    const resolvedPath = path.resolve(cwd, overridePath);
    return { path: resolvedPath, exists: fs.existsSync(resolvedPath), explicit: true };
  }

  const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
  return { path: defaultPath, exists: fs.existsSync(defaultPath), explicit: false };
}

// ============================================================================
// YAML Parsing
// ============================================================================

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses YAML content into a config file structure
 */
export function parseYamlConfig(content: string, filePath?: string): YamlConfigFile {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (err) {
    throw new ValidationError(
      `Failed to parse YAML configuration${filePath ? ` (${filePath})` : ''}: ${err instanceof Error ? err.message : String(err)}`,
      ErrorCode.INVALID_CONFIG,
      { filePath },
      err instanceof Error ? err : undefined
    );
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new ValidationError(
      `Configuration file must contain a mapping${filePath ? ` (${filePath})` : ''}`,
      ErrorCode.INVALID_CONFIG,
      { filePath, value: parsed }
    );
  }
  return parsed;
}

/**
 * Converts YAML config (snake_case) to internal format (camelCase)
 *
 * @param baseDir - Directory relative paths resolve against
 */
export function convertYamlToConfig(yamlConfig: YamlConfigFile, baseDir: string): PartialServerConfig {
  const result: PartialServerConfig = {};

  if (yamlConfig.port !== undefined) {
    result.port = validatePort(yamlConfig.port);
  }
  if (yamlConfig.host !== undefined) {
    result.host = validateHost(yamlConfig.host);
  }
  if (yamlConfig.static_dir !== undefined) {
    result.staticDir = path.resolve(baseDir, validatePath('static_dir', yamlConfig.static_dir));
  }
  if (yamlConfig.seed_file !== undefined) {
    result.seedFile = path.resolve(baseDir, validatePath('seed_file', yamlConfig.seed_file));
  }
  if (yamlConfig.cors_origins !== undefined) {
    result.corsOrigins = validateCorsOrigins(yamlConfig.cors_origins);
  }
  if (yamlConfig.log_level !== undefined) {
    const level = typeof yamlConfig.log_level === 'string' ? parseLogLevel(yamlConfig.log_level) : undefined;
    if (level === undefined) {
      throw invalidConfig('log_level', yamlConfig.log_level, 'DEBUG, INFO, WARNING or ERROR');
    }
    result.logLevel = level;
  }

  return result;
}

/**
 * Reads and converts a config file
 */
export function readConfigFile(filePath: string): PartialServerConfig {
  if (!fs.existsSync(filePath)) {
    throw configFileNotFound(filePath);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return convertYamlToConfig(parseYamlConfig(content, filePath), path.dirname(filePath));
}
