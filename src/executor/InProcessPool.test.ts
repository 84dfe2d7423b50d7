import { describe, it, expect } from 'vitest';
import { PoolUnavailableError } from '../errors.js';
import { Tool } from '../tool/Tool.js';
import { InProcessPool } from './InProcessPool.js';
import type { ExecutionUnit } from './types.js';

function unitFor(tool: Tool, args: Record<string, unknown>, callId = 'call_1'): ExecutionUnit {
  return { callId, functionName: tool.name, args, tool };
}

describe('InProcessPool', () => {
  it('runs sync and async tools', async () => {
    const pool = new InProcessPool({ concurrency: 2 });
    const add = Tool.fromFunction(({ a, b }: { a: number; b: number }) => a + b, { name: 'add' });
    const later = Tool.fromFunction(async ({ a }: { a: number }) => a * 2, { name: 'double' });

    await expect(pool.submit(unitFor(add, { a: 2, b: 3 }))).resolves.toBe(5);
    await expect(pool.submit(unitFor(later, { a: 4 }))).resolves.toBe(8);
  });

  it('reports tool failures as error strings', async () => {
    const pool = new InProcessPool();
    const fail = Tool.fromFunction(() => {
      throw new Error('bad input');
    }, { name: 'fail' });

    await expect(pool.submit(unitFor(fail, {}))).resolves.toBe('Error executing fail: bad input');
  });

  it('bounds concurrency', async () => {
    const pool = new InProcessPool({ concurrency: 1 });
    let running = 0;
    let peak = 0;
    const slow = Tool.fromFunction(async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
      return 'done';
    }, { name: 'slow' });

    const results = await Promise.all([1, 2, 3].map((n) => pool.submit(unitFor(slow, {}, `call_${n}`))));

    expect(results).toEqual(['done', 'done', 'done']);
    expect(peak).toBe(1);
  });

  it('rejects new work after shutdown and shuts down idempotently', async () => {
    const pool = new InProcessPool();
    const noop = Tool.fromFunction(() => null, { name: 'noop' });

    await pool.shutdown();
    await pool.shutdown();

    expect(pool.isAvailable()).toBe(false);
    await expect(pool.submit(unitFor(noop, {}))).rejects.toBeInstanceOf(PoolUnavailableError);
  });
});
