/**
 * Process Entry Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ErrorCode, ValidationError, NotFoundError, type ActivityCatalog } from '@mergington/core';
import { createDirectoryFromConfig, main, parseCliArgs, run, USAGE } from './cli.js';
import type { ServerConfig } from './config/index.js';
import { startActivitiesServer, type ActivitiesServer } from './server/index.js';
import { configureLogging, getLogLevel } from './utils/logger.js';

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'activities-cli-test-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

function configWith(seedFile?: string): ServerConfig {
  return { port: 8000, host: 'localhost', staticDir: tempDir, seedFile, corsOrigins: [] };
}

describe('parseCliArgs', () => {
  it('should return no overrides for no arguments', () => {
    expect(parseCliArgs([])).toEqual({ help: false, configPath: undefined, overrides: {} });
  });

  it('should read every flag', () => {
    const args = parseCliArgs([
      '--port',
      '9000',
      '--host',
      '0.0.0.0',
      '--config',
      'custom.yaml',
      '--static-dir',
      'public',
      '--seed-file',
      'clubs.yaml',
    ]);

    expect(args.configPath).toBe('custom.yaml');
    expect(args.overrides).toEqual({
      port: 9000,
      host: '0.0.0.0',
      staticDir: path.resolve('public'),
      seedFile: path.resolve('clubs.yaml'),
    });
  });

  it('should recognise -h and --help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('should reject an invalid port', () => {
    expect(() => parseCliArgs(['--port', 'eighty'])).toThrow(ValidationError);
    expect(() => parseCliArgs(['--port', '70000'])).toThrow('Invalid configuration value for port');
  });

  it('should reject unknown flags as invalid arguments', () => {
    try {
      parseCliArgs(['--verbose']);
      expect.unreachable('parseCliArgs should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.code).toBe(ErrorCode.INVALID_ARGUMENTS);
        expect(err.details.value).toBe('--verbose');
      }
    }
  });
});

describe('createDirectoryFromConfig', () => {
  it('should use the built-in activities without a seed file', () => {
    const directory = createDirectoryFromConfig(configWith());

    expect(directory.size).toBe(9);
    expect(directory.has('Chess Club')).toBe(true);
  });

  it('should load activities from a YAML seed file', () => {
    const seedFile = path.join(tempDir, 'clubs.yaml');
    fs.writeFileSync(
      seedFile,
      [
        'Debate Club:',
        '  description: Argue both sides',
        '  schedule: Tuesdays, 4:00 PM - 5:00 PM',
        '  max_participants: 10',
        '  participants:',
        '    - speaker@example.edu',
      ].join('\n')
    );

    const directory = createDirectoryFromConfig(configWith(seedFile));

    expect(directory.size).toBe(1);
    expect(directory.listActivities()).toEqual({
      'Debate Club': {
        description: 'Argue both sides',
        schedule: 'Tuesdays, 4:00 PM - 5:00 PM',
        max_participants: 10,
        participants: ['speaker@example.edu'],
      },
    });
  });

  it('should load activities from a JSON seed file', () => {
    const seedFile = path.join(tempDir, 'clubs.json');
    fs.writeFileSync(
      seedFile,
      JSON.stringify({
        'Film Club': { description: 'Watch films', schedule: 'Fridays', max_participants: 20, participants: [] },
      })
    );

    expect(createDirectoryFromConfig(configWith(seedFile)).has('Film Club')).toBe(true);
  });

  it('should reject a missing seed file', () => {
    expect(() => createDirectoryFromConfig(configWith(path.join(tempDir, 'absent.yaml')))).toThrow(NotFoundError);
  });

  it('should reject an invalid seed file', () => {
    const seedFile = path.join(tempDir, 'bad.yaml');
    fs.writeFileSync(seedFile, 'Debate Club:\n  description: Argue\n');

    try {
      createDirectoryFromConfig(configWith(seedFile));
      expect.unreachable('createDirectoryFromConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.code).toBe(ErrorCode.INVALID_SEED);
      }
    }
  });
});

// ============================================================================
// main / run
// ============================================================================

async function startFromArgs(argv: string[]): Promise<ActivitiesServer> {
  const server = await main(argv);
  if (server === undefined) {
    throw new Error('main did not start a server');
  }
  return server;
}

describe('main', () => {
  let running: ActivitiesServer | undefined;

  beforeEach(() => {
    vi.stubEnv('LOG_LEVEL', '');
  });

  afterEach(async () => {
    await running?.close();
    running = undefined;
    configureLogging({});
  });

  it('should print usage and start nothing for --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const server = await main(['--help']);

    expect(server).toBeUndefined();
    expect(log).toHaveBeenCalledWith(USAGE);
  });

  it('should serve the directory on the flags given', async () => {
    running = await startFromArgs(['--port', '0', '--host', '127.0.0.1', '--static-dir', tempDir]);

    const res = await fetch(`http://127.0.0.1:${running.port}/activities`);
    const catalog: ActivityCatalog = await res.json();

    expect(running.host).toBe('127.0.0.1');
    expect(res.status).toBe(200);
    expect(Object.keys(catalog)).toHaveLength(9);
  });

  it('should apply the log level from the config file', async () => {
    const configFile = path.join(tempDir, 'activities.yaml');
    fs.writeFileSync(configFile, 'log_level: error\n');

    running = await startFromArgs(['--config', configFile, '--port', '0', '--host', '127.0.0.1']);

    expect(getLogLevel()).toBe('ERROR');
  });

  it('should serve activities from a seed file flag', async () => {
    const seedFile = path.join(tempDir, 'clubs.json');
    fs.writeFileSync(
      seedFile,
      JSON.stringify({ 'Film Club': { description: 'Films', schedule: 'Fridays', max_participants: 5, participants: [] } })
    );

    running = await startFromArgs(['--seed-file', seedFile, '--port', '0', '--host', '127.0.0.1']);

    expect(running.directory.has('Film Club')).toBe(true);
    expect(running.directory.size).toBe(1);
  });

  it('should reject a missing config file', async () => {
    await expect(main(['--config', path.join(tempDir, 'missing.yaml')])).rejects.toMatchObject({
      code: ErrorCode.CONFIG_FILE_NOT_FOUND,
    });
  });

  it('should detach its signal handlers on close', async () => {
    const sigint = process.listenerCount('SIGINT');
    const sigterm = process.listenerCount('SIGTERM');

    const server = await startFromArgs(['--port', '0', '--host', '127.0.0.1']);

    expect(process.listenerCount('SIGINT')).toBe(sigint + 1);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm + 1);

    await server.close();

    expect(process.listenerCount('SIGINT')).toBe(sigint);
    expect(process.listenerCount('SIGTERM')).toBe(sigterm);
  });
});

describe('run', () => {
  let exit: ReturnType<typeof spyOnExit>;

  function spyOnExit() {
    return vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
  }

  beforeEach(() => {
    exit = spyOnExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('should exit 2 on unknown flags', async () => {
    await expect(run(['--verbose'])).rejects.toThrow('exit 2');
    expect(exit).toHaveBeenCalledWith(2);
  });

  it('should exit 3 when the config file is missing', async () => {
    await expect(run(['--config', path.join(tempDir, 'missing.yaml')])).rejects.toThrow('exit 3');
    expect(exit).toHaveBeenCalledWith(3);
  });

  it('should exit 4 on an invalid port', async () => {
    await expect(run(['--port', 'eighty'])).rejects.toThrow('exit 4');
    expect(exit).toHaveBeenCalledWith(4);
  });

  it('should exit 1 when the port is taken', async () => {
    const occupant = await startActivitiesServer({ port: 0, host: '127.0.0.1' });

    try {
      await expect(run(['--port', String(occupant.port), '--host', '127.0.0.1'])).rejects.toThrow('exit 1');
      expect(exit).toHaveBeenCalledWith(1);
    } finally {
      await occupant.close();
    }
  });
});
