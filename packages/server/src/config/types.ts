/**
 * Configuration Types
 *
 * Settings for the activity directory server. Values come from built-in
 * defaults, an optional YAML file, environment variables, and CLI flags,
 * in increasing order of precedence.
 */

import type { LogLevel } from '../utils/logger.js';

// ============================================================================
// Configuration Interfaces
// ============================================================================

export interface ServerConfig {
  /** TCP port to listen on (default: 8000) */
  port: number;
  /** Interface to bind (default: 'localhost') */
  host: string;
  /** Directory served under /static (default: <cwd>/static) */
  staticDir: string;
  /** Seed file replacing the built-in activities; undefined uses the built-ins */
  seedFile?: string;
  /** Origins allowed by CORS; empty disables the CORS middleware */
  corsOrigins: string[];
  /** Minimum log level; undefined leaves the logger on LOG_LEVEL / INFO */
  logLevel?: LogLevel;
  /** Config file the values were read from, if any */
  configFile?: string;
}

/**
 * Subset of settings supplied by one source
 */
export type PartialServerConfig = Partial<Omit<ServerConfig, 'configFile'>>;

/**
 * Raw YAML file shape (snake_case keys). Values are checked on conversion.
 */
export interface YamlConfigFile {
  port?: unknown;
  host?: unknown;
  static_dir?: unknown;
  seed_file?: unknown;
  cors_origins?: unknown;
  log_level?: unknown;
}

// ============================================================================
// Environment Variables
// ============================================================================

export const EnvVars = {
  PORT: 'ACTIVITIES_PORT',
  HOST: 'ACTIVITIES_HOST',
  STATIC_DIR: 'ACTIVITIES_STATIC_DIR',
  SEED_FILE: 'ACTIVITIES_SEED_FILE',
  CORS_ORIGINS: 'ACTIVITIES_CORS_ORIGINS',
  CONFIG: 'ACTIVITIES_CONFIG',
  LOG_LEVEL: 'LOG_LEVEL',
} as const;

export type EnvVar = (typeof EnvVars)[keyof typeof EnvVars];

/**
 * Generic fallbacks consulted when the prefixed variable is unset
 */
export const FallbackEnvVars = {
  PORT: 'PORT',
  HOST: 'HOST',
} as const;

// ============================================================================
// Configuration Operations
// ============================================================================

export interface LoadConfigOptions {
  /** Base directory for the default config file and relative paths (default: process.cwd()) */
  cwd?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Config file path; a missing file is an error when set here or via ACTIVITIES_CONFIG */
  configPath?: string;
  /** Skip environment variables */
  skipEnv?: boolean;
  /** Skip config file loading */
  skipFile?: boolean;
  /** Caller defaults layered over the built-ins, below the file */
  defaults?: PartialServerConfig;
  /** CLI flag overrides */
  cliOverrides?: PartialServerConfig;
}

export interface ConfigFileDiscovery {
  /** Path of the candidate file */
  path: string;
  /** Whether the file exists */
  exists: boolean;
  /** Whether the path was named explicitly rather than defaulted */
  explicit: boolean;
}
