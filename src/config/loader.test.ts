import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ConfigValidationError } from '../errors.js';
import { applyDefaults, loadConfig, substituteEnvVarsRecursive, validateConfig } from './loader.js';
import { DEFAULT_CONFIG } from './types.js';

describe('loadConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = join(tmpdir(), `registry-config-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  afterEach(() => {
    delete process.env.TEST_REGISTRY_WORKERS;
  });

  async function write(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content);
    return path;
  }

  it('returns the defaults when the file is missing', async () => {
    const config = await loadConfig({ configPath: join(dir, 'absent.yaml') });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges the file over the defaults', async () => {
    const configPath = await write(
      'partial.yaml',
      [
        'name: tools',
        'executor:',
        '  mode: thread',
        '  processPool:',
        '    maxWorkers: 2',
        'http:',
        '  timeoutMs: 5000',
      ].join('\n'),
    );

    const config = await loadConfig({ configPath });

    expect(config).toEqual({
      name: 'tools',
      logging: {},
      executor: {
        mode: 'thread',
        fallback: 'thread',
        processPool: { maxWorkers: 2, execArgv: [], preload: [] },
        threadPool: {},
      },
      http: { timeoutMs: 5000 },
    });
  });

  it('substitutes environment variables', async () => {
    process.env.TEST_REGISTRY_WORKERS = '6';
    const configPath = await write(
      'env.yaml',
      [
        'executor:',
        '  processPool:',
        '    maxWorkers: ${TEST_REGISTRY_WORKERS}',
        '  threadPool:',
        '    concurrency: ${TEST_REGISTRY_UNSET:-3}',
      ].join('\n'),
    );

    const config = await loadConfig({ configPath });

    expect(config.executor.processPool.maxWorkers).toBe(6);
    expect(config.executor.threadPool.concurrency).toBe(3);
  });

  it('treats an empty file as no overrides', async () => {
    const configPath = await write('empty.yaml', '');
    await expect(loadConfig({ configPath })).resolves.toEqual(DEFAULT_CONFIG);
  });

  it('rejects invalid values', async () => {
    const configPath = await write('bad.yaml', 'executor:\n  mode: fiber\n');

    await expect(loadConfig({ configPath })).rejects.toThrow(
      "Config validation error at 'executor.mode': mode must be one of: process, thread",
    );
  });

  it('rejects unparsable YAML', async () => {
    const configPath = await write('broken.yaml', 'executor: [unclosed');
    await expect(loadConfig({ configPath })).rejects.toBeInstanceOf(ConfigValidationError);
  });
});

describe('validateConfig', () => {
  it('reports the path of the offending value', () => {
    expect(() => validateConfig({ executor: { threadPool: { concurrency: 0 } } })).toThrow(
      "Config validation error at 'executor.threadPool.concurrency': concurrency must be a positive integer",
    );
    expect(() => validateConfig({ executor: { processPool: { preload: [1] } } })).toThrow(
      "Config validation error at 'executor.processPool.preload': preload must be an array of strings",
    );
    expect(() => validateConfig({ logging: { level: 'loud' } })).toThrow(ConfigValidationError);
    expect(() => validateConfig({ executor: { fallback: 'retry' } })).toThrow(
      "Config validation error at 'executor.fallback': fallback must be one of: thread, none",
    );
    expect(() => validateConfig({ executor: { fallback: 'none' }, http: { timeoutMs: 100 } })).not.toThrow();
  });
});

describe('substituteEnvVarsRecursive', () => {
  it('replaces placeholders inside nested values', () => {
    expect(substituteEnvVarsRecursive({ list: ['--flag=${TEST_REGISTRY_UNSET:-on}'], n: 1 })).toEqual({
      list: ['--flag=on'],
      n: 1,
    });
  });
});

describe('applyDefaults', () => {
  it('keeps default pool settings when only the mode is given', () => {
    const config = applyDefaults({ executor: { mode: 'thread' } });
    expect(config.executor).toEqual({ ...DEFAULT_CONFIG.executor, mode: 'thread' });
    expect(config).not.toBe(DEFAULT_CONFIG);
  });
});
