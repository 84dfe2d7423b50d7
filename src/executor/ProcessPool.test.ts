import { EventEmitter } from 'node:events';
import { describe, it, expect } from 'vitest';
import { PoolUnavailableError, WorkerCrashedError } from '../errors.js';
import { Tool } from '../tool/Tool.js';
import { ProcessPool, type ForkFn, type WorkerProcess } from './ProcessPool.js';
import type { ExecutionUnit, WorkerRequest } from './types.js';
import { WorkerRuntime } from './WorkerRuntime.js';

type Behaviour = 'answer' | 'hang' | 'fail-to-start';

class FakeWorker extends EventEmitter implements WorkerProcess {
  readonly sent: WorkerRequest[] = [];
  killed = false;

  constructor(
    readonly pid: number,
    private readonly behaviour: Behaviour,
    private readonly runtime: WorkerRuntime,
  ) {
    super();
    setImmediate(() => {
      if (this.behaviour === 'fail-to-start') {
        this.emit('error', new Error('spawn ENOENT'));
      } else {
        this.emit('spawn');
      }
    });
  }

  send(message: WorkerRequest): boolean {
    this.sent.push(message);
    if (this.behaviour === 'answer') {
      // Round-trip through JSON like the IPC channel does.
      const wire: unknown = JSON.parse(JSON.stringify(message));
      void this.runtime.handle(wire).then((response) => {
        this.emit('message', JSON.parse(JSON.stringify(response)));
      });
    }
    return true;
  }

  kill(): boolean {
    this.killed = true;
    setImmediate(() => this.emit('exit', null, 'SIGTERM'));
    return true;
  }

  crash(code: number): void {
    this.emit('exit', code, null);
  }
}

const toolsModule = {
  add: ({ a, b }: { a: number; b: number }) => a + b,
};

function fakeFork(behaviour: Behaviour = 'answer') {
  const runtime = new WorkerRuntime({
    importer: async (specifier) => {
      if (specifier !== 'mem:tools') throw new Error(`Cannot find module '${specifier}'`);
      return toolsModule;
    },
  });
  const workers: FakeWorker[] = [];
  const calls: { path: URL; args: string[] }[] = [];
  const fork: ForkFn = (path, args) => {
    calls.push({ path, args });
    const worker = new FakeWorker(1000 + workers.length, behaviour, runtime);
    workers.push(worker);
    return worker;
  };
  return { fork, workers, calls };
}

function addUnit(callId: string, a: number, b: number): ExecutionUnit {
  const tool = Tool.fromFunction(toolsModule.add, { origin: { module: 'mem:tools', export: 'add' } });
  return { callId, functionName: 'add', args: { a, b }, tool };
}

describe('ProcessPool', () => {
  it('forks lazily and runs a unit through its origin', async () => {
    const { fork, workers, calls } = fakeFork();
    const pool = new ProcessPool({
      fork,
      maxWorkers: 2,
      preload: ['mem:tools'],
      workerPath: new URL('file:///srv/worker.js'),
    });
    expect(pool.size).toBe(0);

    await expect(pool.submit(addUnit('call_1', 2, 3))).resolves.toBe(5);

    expect(workers).toHaveLength(1);
    expect(calls[0]?.path.href).toBe('file:///srv/worker.js');
    expect(calls[0]?.args).toEqual(['mem:tools']);
    expect(workers[0]?.sent[0]).toEqual({
      type: 'call',
      taskId: 1,
      callId: 'call_1',
      functionName: 'add',
      args: { a: 2, b: 3 },
      origin: { module: 'mem:tools', export: 'add' },
    });
    await pool.shutdown();
  });

  it('reuses idle workers and never forks past maxWorkers', async () => {
    const { fork, workers } = fakeFork();
    const pool = new ProcessPool({ fork, maxWorkers: 2 });

    const results = await Promise.all([
      pool.submit(addUnit('a', 1, 1)),
      pool.submit(addUnit('b', 2, 2)),
      pool.submit(addUnit('c', 3, 3)),
    ]);
    expect(results).toEqual([2, 4, 6]);
    expect(workers).toHaveLength(2);

    await pool.submit(addUnit('d', 4, 4));
    expect(workers).toHaveLength(2);
    await pool.shutdown();
  });

  it('sends no origin for tools that have none', async () => {
    const { fork, workers } = fakeFork();
    const pool = new ProcessPool({ fork });
    const tool = Tool.fromFunction(toolsModule.add);

    const result = await pool.submit({ callId: 'x', functionName: 'add', args: {}, tool });

    expect(result).toBe("Error: Tool 'add' not found or callable is None");
    expect(workers[0]?.sent[0]).not.toHaveProperty('origin');
    await pool.shutdown();
  });

  it('rejects in-flight units when a worker crashes and forks a replacement', async () => {
    const { fork, workers } = fakeFork('hang');
    const pool = new ProcessPool({ fork, maxWorkers: 1 });

    const pending = pool.submit(addUnit('call_1', 1, 2));
    workers[0]?.crash(3);

    await expect(pending).rejects.toBeInstanceOf(WorkerCrashedError);
    await expect(pending).rejects.toThrow('worker process exited unexpectedly (code 3, signal null)');
    expect(pool.size).toBe(0);
    expect(pool.isAvailable()).toBe(true);

    void pool.submit(addUnit('call_2', 1, 2)).catch(() => undefined);
    expect(workers).toHaveLength(2);
    await pool.shutdown();
  });

  it('becomes unavailable when a worker cannot be started', async () => {
    const { fork } = fakeFork('fail-to-start');
    const pool = new ProcessPool({ fork });

    const pending = pool.submit(addUnit('call_1', 1, 2));
    await expect(pending).rejects.toBeInstanceOf(PoolUnavailableError);
    await expect(pending).rejects.toThrow('failed to start worker process: spawn ENOENT');

    expect(pool.isAvailable()).toBe(false);
    await expect(pool.submit(addUnit('call_2', 1, 2))).rejects.toThrow(
      'failed to start worker process: spawn ENOENT',
    );
  });

  it('treats a throwing fork as unavailability', async () => {
    const fork: ForkFn = () => {
      throw new Error('EAGAIN');
    };
    const pool = new ProcessPool({ fork });

    await expect(pool.submit(addUnit('call_1', 1, 2))).rejects.toThrow(
      'failed to start worker process: EAGAIN',
    );
    expect(pool.isAvailable()).toBe(false);
  });

  it('kills workers and rejects pending units on shutdown', async () => {
    const { fork, workers } = fakeFork('hang');
    const pool = new ProcessPool({ fork });

    const rejected = expect(pool.submit(addUnit('call_1', 1, 2))).rejects.toThrow(
      'process pool is shut down',
    );
    await pool.shutdown();
    await pool.shutdown();

    await rejected;
    expect(workers[0]?.killed).toBe(true);
    expect(pool.isAvailable()).toBe(false);
    await expect(pool.submit(addUnit('call_2', 1, 2))).rejects.toBeInstanceOf(PoolUnavailableError);
  });
});
