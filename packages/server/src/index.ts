/**
 * @mergington/server
 *
 * HTTP surface, configuration, and process entry for the activity directory.
 */

export {
  createActivitiesApp,
  startActivitiesServer,
  type ActivitiesApp,
  type ActivitiesAppOptions,
  type ActivitiesServer,
  type ActivitiesServerOptions,
} from './server/index.js';
export { registerStaticMiddleware, getContentType } from './server/static.js';
export * from './routes/index.js';
export * from './config/index.js';
export { createLogger, configureLogging, getLogLevel, parseLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export { main, run, parseCliArgs, createDirectoryFromConfig, USAGE, type MainDefaults, type ParsedArgs } from './cli.js';
