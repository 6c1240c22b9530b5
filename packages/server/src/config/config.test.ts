/**
 * Configuration Loading Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ErrorCode, NotFoundError, ValidationError } from '@mergington/core';

import { loadConfig, mergeConfiguration } from './config.js';
import { getDefaultConfig } from './defaults.js';
import { loadEnvConfig, parseEnvList } from './env.js';

let tempDir: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'activities-load-test-'));
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

function writeConfig(name: string, content: string): string {
  const file = path.join(tempDir, name);
  fs.writeFileSync(file, content);
  return file;
}

describe('getDefaultConfig', () => {
  it('should serve ./static on localhost:8000', () => {
    expect(getDefaultConfig(tempDir)).toEqual({
      port: 8000,
      host: 'localhost',
      staticDir: path.join(tempDir, 'static'),
      corsOrigins: [],
    });
  });
});

describe('mergeConfiguration', () => {
  it('should ignore undefined values', () => {
    const base = getDefaultConfig(tempDir);

    expect(mergeConfiguration(base, { port: undefined, host: '0.0.0.0' })).toEqual({
      ...base,
      host: '0.0.0.0',
    });
  });
});

describe('loadEnvConfig', () => {
  it('should read prefixed variables', () => {
    const config = loadEnvConfig(
      {
        ACTIVITIES_PORT: '9001',
        ACTIVITIES_HOST: '127.0.0.1',
        ACTIVITIES_STATIC_DIR: 'public',
        ACTIVITIES_SEED_FILE: 'seed.yaml',
        ACTIVITIES_CORS_ORIGINS: 'http://a.test, ,http://b.test',
        LOG_LEVEL: 'warn',
      },
      tempDir
    );

    expect(config).toEqual({
      port: 9001,
      host: '127.0.0.1',
      staticDir: path.join(tempDir, 'public'),
      seedFile: path.join(tempDir, 'seed.yaml'),
      corsOrigins: ['http://a.test', 'http://b.test'],
      logLevel: 'WARNING',
    });
  });

  it('should fall back to PORT and HOST', () => {
    expect(loadEnvConfig({ PORT: '3000', HOST: 'example.test' }, tempDir)).toEqual({
      port: 3000,
      host: 'example.test',
    });
  });

  it('should prefer the prefixed port', () => {
    expect(loadEnvConfig({ PORT: '3000', ACTIVITIES_PORT: '4000' }, tempDir).port).toBe(4000);
  });

  it('should treat empty values as unset', () => {
    expect(loadEnvConfig({ ACTIVITIES_PORT: '', ACTIVITIES_HOST: '' }, tempDir)).toEqual({});
  });

  it('should leave an unknown log level to the logger', () => {
    expect(loadEnvConfig({ LOG_LEVEL: 'chatty' }, tempDir)).toEqual({});
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadEnvConfig({ ACTIVITIES_PORT: 'eighty' }, tempDir)).toThrow(
      'Invalid configuration value for port: eighty (expected integer between 1 and 65535)'
    );
  });
});

describe('parseEnvList', () => {
  it('should split and trim', () => {
    expect(parseEnvList(' a ,b,, c')).toEqual(['a', 'b', 'c']);
  });
});

describe('loadConfig', () => {
  it('should return defaults when nothing is set', () => {
    expect(loadConfig({ cwd: tempDir, env: {} })).toEqual(getDefaultConfig(tempDir));
  });

  it('should read the default config file when present', () => {
    const file = writeConfig('activities.config.yaml', 'port: 8100\nhost: 0.0.0.0\n');

    const config = loadConfig({ cwd: tempDir, env: {} });

    expect(config.port).toBe(8100);
    expect(config.host).toBe('0.0.0.0');
    expect(config.configFile).toBe(file);
  });

  it('should apply env over file and CLI over env', () => {
    writeConfig('activities.config.yaml', 'port: 8100\nhost: file.test\nseed_file: seed.yaml\n');

    const config = loadConfig({
      cwd: tempDir,
      env: { ACTIVITIES_PORT: '8200', ACTIVITIES_HOST: 'env.test' },
      cliOverrides: { port: 8300 },
    });

    expect(config.port).toBe(8300);
    expect(config.host).toBe('env.test');
    expect(config.seedFile).toBe(path.join(tempDir, 'seed.yaml'));
  });

  it('should use ACTIVITIES_CONFIG to locate the file', () => {
    writeConfig('custom.yaml', 'port: 8400\n');

    expect(loadConfig({ cwd: tempDir, env: { ACTIVITIES_CONFIG: 'custom.yaml' } }).port).toBe(8400);
  });

  it('should fail when a named config file is missing', () => {
    expect(() => loadConfig({ cwd: tempDir, env: {}, configPath: 'absent.yaml' })).toThrow(NotFoundError);
  });

  it('should skip the file and env when asked', () => {
    writeConfig('activities.config.yaml', 'port: 8100\n');

    const config = loadConfig({ cwd: tempDir, env: { ACTIVITIES_PORT: '8200' }, skipFile: true, skipEnv: true });

    expect(config.port).toBe(8000);
    expect(config.configFile).toBeUndefined();
  });

  it('should validate CLI overrides', () => {
    try {
      loadConfig({ cwd: tempDir, env: {}, cliOverrides: { port: 0 } });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(error.details.field).toBe('port');
      }
    }
  });
});
