/**
 * Process Entry
 *
 * Parses flags, loads configuration, builds the directory, and runs the
 * server until SIGINT or SIGTERM.
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import {
  ActivityDirectory,
  ErrorExitCode,
  getExitCode,
  invalidArguments,
  isDirectoryError,
} from '@mergington/core';
import { loadConfig, loadSeedFile, parsePort, type PartialServerConfig, type ServerConfig } from './config/index.js';
import { startActivitiesServer, type ActivitiesServer } from './server/index.js';
import { configureLogging, createLogger } from './utils/logger.js';

const logger = createLogger('activities-server');

export const USAGE = `Usage: activities-server [options]

Options:
  --port <port>         Port to listen on (default: 8000)
  --host <host>         Interface to bind (default: localhost)
  --config <file>       YAML config file (default: ./activities.config.yaml if present)
  --static-dir <dir>    Directory served under /static (default: ./static)
  --seed-file <file>    YAML or JSON file replacing the built-in activities
  -h, --help            Show this help
`;

export interface ParsedArgs {
  help: boolean;
  configPath?: string;
  overrides: PartialServerConfig;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        port: { type: 'string' },
        host: { type: 'string' },
        config: { type: 'string' },
        'static-dir': { type: 'string' },
        'seed-file': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw invalidArguments(err instanceof Error ? err.message : String(err), { value: argv.join(' ') });
  }
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  const values = readFlags(argv);

  const overrides: PartialServerConfig = {};
  if (values.port !== undefined) overrides.port = parsePort(values.port);
  if (values.host !== undefined) overrides.host = values.host;
  if (values['static-dir'] !== undefined) overrides.staticDir = resolve(values['static-dir']);
  if (values['seed-file'] !== undefined) overrides.seedFile = resolve(values['seed-file']);

  return { help: values.help ?? false, configPath: values.config, overrides };
}

/**
 * Builds the directory from the configured seed file, or the built-in seed
 */
export function createDirectoryFromConfig(config: ServerConfig): ActivityDirectory {
  if (config.seedFile === undefined) {
    return new ActivityDirectory();
  }
  logger.info(`Loading activities from ${config.seedFile}`);
  return new ActivityDirectory(loadSeedFile(config.seedFile));
}

export interface MainDefaults {
  /** Static directory used when no file, env var or flag sets one */
  staticDir?: string;
}

/**
 * Starts the server from command-line arguments.
 *
 * @returns the running server, or undefined when only help was printed
 */
export async function main(argv: string[] = process.argv.slice(2), defaults: MainDefaults = {}): Promise<ActivitiesServer | undefined> {
  const args = parseCliArgs(argv);
  if (args.help) {
    console.log(USAGE);
    return undefined;
  }

  const config = loadConfig({
    configPath: args.configPath,
    defaults: { staticDir: defaults.staticDir },
    cliOverrides: args.overrides,
  });
  if (config.logLevel !== undefined) {
    configureLogging({ level: config.logLevel });
  }
  if (config.configFile) {
    logger.info(`Using config file ${config.configFile}`);
  }

  const server = await startActivitiesServer({
    directory: createDirectoryFromConfig(config),
    port: config.port,
    host: config.host,
    staticDir: config.staticDir,
    corsOrigins: config.corsOrigins,
  });

  // Closing by hand or by signal detaches both handlers
  const stop = async () => {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
    await server.close();
  };
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    stop().then(
      () => process.exit(ErrorExitCode.SUCCESS),
      (err: unknown) => {
        logger.error('Failed to close server:', err);
        process.exit(ErrorExitCode.GENERAL_ERROR);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return { ...server, close: stop };
}

/**
 * Runs `main` and exits with the error's exit code on startup failure
 */
export function run(argv: string[] = process.argv.slice(2), defaults: MainDefaults = {}): Promise<void> {
  return main(argv, defaults).then(
    () => undefined,
    (err: unknown) => {
      if (isDirectoryError(err)) {
        logger.error(err.message);
        process.exit(getExitCode(err.code));
      }
      logger.error('Failed to start:', err);
      process.exit(ErrorExitCode.GENERAL_ERROR);
    }
  );
}
