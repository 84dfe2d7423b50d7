/**
 * In-process pool ("thread" mode).
 *
 * Units run on this process's event loop through a bounded p-queue. There is
 * no isolation: a synchronous tool blocks the loop while it runs, and a tool
 * that corrupts shared state does so for the caller too.
 */

import { availableParallelism } from 'node:os';
import PQueue from 'p-queue';
import { PoolUnavailableError } from '../errors.js';
import type { JsonValue } from '../types/common.js';
import { runInvocation } from './invoke.js';
import type { ExecutionUnit, WorkerPool } from './types.js';

export interface InProcessPoolOptions {
  /** Max units in flight (default: available parallelism) */
  concurrency?: number;
}

export class InProcessPool implements WorkerPool {
  readonly kind = 'thread' as const;
  private readonly queue: PQueue;
  private closed = false;

  constructor(options: InProcessPoolOptions = {}) {
    this.queue = new PQueue({ concurrency: options.concurrency ?? availableParallelism() });
  }

  isAvailable(): boolean {
    return !this.closed;
  }

  async submit(unit: ExecutionUnit): Promise<JsonValue> {
    if (this.closed) {
      throw new PoolUnavailableError('thread pool is shut down');
    }
    return this.queue.add(
      () => runInvocation(unit.functionName, unit.tool.invocable, unit.args),
      { throwOnTimeout: true },
    );
  }

  /** Units waiting for a slot */
  get pending(): number {
    return this.queue.size;
  }

  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.queue.onIdle();
  }
}
