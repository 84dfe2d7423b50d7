import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { createLogger } from '../logging/logger.js';
import { ToolRegistry } from '../registry/ToolRegistry.js';
import type { ToolCall } from '../types/common.js';

const TOOLS_MODULE = `
export function add({ a, b }) {
  return a + b;
}

export function divide({ a, b }) {
  if (b === 0) throw new Error('division by zero');
  return a / b;
}
`;

function call(id: string, name: string, args: unknown): ToolCall {
  return { id, type: 'function', function: { name, arguments: JSON.stringify(args) } };
}

describe('worker process', () => {
  let dir: string;
  let modulePath: string;

  beforeAll(async () => {
    dir = join(tmpdir(), `registry-worker-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    modulePath = join(dir, 'tools.mjs');
    await writeFile(modulePath, TOOLS_MODULE);
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs module tools in a forked worker', async () => {
    const registry = new ToolRegistry({
      executorOptions: { defaultMode: 'process', fallback: 'none', processPool: { maxWorkers: 1 } },
      logger: createLogger({ level: 'silent' }),
    });

    try {
      await registry.registerFromModule(modulePath);
      expect(registry.getAvailableTools().sort()).toEqual(['add', 'divide']);

      const results = await registry.executeToolCalls([
        call('c1', 'add', { a: 2, b: 3 }),
        call('c2', 'divide', { a: 1, b: 0 }),
      ]);

      expect(results).toEqual({
        c1: 5,
        c2: 'Error executing divide: division by zero',
      });
    } finally {
      await registry.shutdown();
    }
  });
});
