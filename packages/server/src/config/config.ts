/**
 * Configuration Loading
 *
 * Precedence (highest to lowest):
 * 1. CLI overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Caller defaults, then built-in defaults
 */

import type { LoadConfigOptions, PartialServerConfig, ServerConfig } from './types.js';
import { getDefaultConfig } from './defaults.js';
import { discoverConfigFile, readConfigFile } from './file.js';
import { getEnvConfigPath, loadEnvConfig } from './env.js';
import { validateConfiguration } from './validation.js';

/**
 * Overlays the defined values of `override` onto `base`
 */
export function mergeConfiguration(base: ServerConfig, override: PartialServerConfig): ServerConfig {
  const merged: ServerConfig = { ...base, corsOrigins: [...base.corsOrigins] };

  if (override.port !== undefined) merged.port = override.port;
  if (override.host !== undefined) merged.host = override.host;
  if (override.staticDir !== undefined) merged.staticDir = override.staticDir;
  if (override.seedFile !== undefined) merged.seedFile = override.seedFile;
  if (override.corsOrigins !== undefined) merged.corsOrigins = [...override.corsOrigins];
  if (override.logLevel !== undefined) merged.logLevel = override.logLevel;

  return merged;
}

/**
 * Loads configuration with the full precedence chain.
 *
 * A config file named through `configPath` or ACTIVITIES_CONFIG must exist;
 * the default `activities.config.yaml` is optional.
 *
 * @throws ValidationError (INVALID_CONFIG) for bad values in any source
 * @throws NotFoundError (CONFIG_FILE_NOT_FOUND) for a missing named file
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let config = getDefaultConfig(cwd);
  if (options.defaults) {
    config = mergeConfiguration(config, options.defaults);
  }

  if (!options.skipFile) {
    const envConfigPath = options.skipEnv ? undefined : getEnvConfigPath(env);
    const discovery = discoverConfigFile(options.configPath ?? envConfigPath, cwd);
    if (discovery.exists || discovery.explicit) {
      config = mergeConfiguration(config, readConfigFile(discovery.path));
      config.configFile = discovery.path;
    }
  }

  if (!options.skipEnv) {
    config = mergeConfiguration(config, loadEnvConfig(env, cwd));
  }

  if (options.cliOverrides) {
    config = mergeConfiguration(config, options.cliOverrides);
  }

  return validateConfiguration(config);
}
