/**
 * Configuration Module
 */

export type {
  ServerConfig,
  PartialServerConfig,
  YamlConfigFile,
  LoadConfigOptions,
  ConfigFileDiscovery,
  EnvVar,
} from './types.js';
export { EnvVars, FallbackEnvVars } from './types.js';

export {
  DEFAULT_PORT,
  DEFAULT_HOST,
  DEFAULT_CONFIG_FILE,
  DEFAULT_STATIC_DIR,
  getDefaultConfig,
} from './defaults.js';

export { loadConfig, mergeConfiguration } from './config.js';
export { loadEnvConfig, getEnvConfigPath, parseEnvList } from './env.js';
export { discoverConfigFile, parseYamlConfig, convertYamlToConfig, readConfigFile } from './file.js';
export {
  isValidPort,
  validatePort,
  parsePort,
  validateHost,
  validateCorsOrigins,
  validateConfiguration,
} from './validation.js';
export { loadSeedFile } from './seed-file.js';
