/**
 * Process pool ("process" mode).
 *
 * Units run in forked Node.js worker processes. Functions never cross the
 * process boundary: a unit travels as its tool's origin (module specifier +
 * export path) plus JSON arguments, and the worker imports the function
 * itself. Workers are forked lazily, up to `maxWorkers`, and replaced after a
 * crash.
 */

import { fork as forkProcess, type ForkOptions } from 'node:child_process';
import { availableParallelism } from 'node:os';
import { fileURLToPath } from 'node:url';
import type { Logger } from 'pino';
import { PoolUnavailableError, WorkerCrashedError, errorMessage } from '../errors.js';
import type { JsonValue } from '../types/common.js';
import { normalizeResult } from './results.js';
import {
  WorkerResponseSchema,
  type ExecutionUnit,
  type WorkerPool,
  type WorkerRequest,
} from './types.js';

/**
 * The part of a ChildProcess the pool relies on.
 */
export interface WorkerProcess {
  readonly pid?: number | undefined;
  readonly channel?: { ref(): void; unref(): void } | null | undefined;
  send(message: WorkerRequest): boolean;
  kill(signal?: NodeJS.Signals): boolean;
  unref?(): void;
  on(event: 'spawn', listener: () => void): this;
  on(event: 'message', listener: (message: unknown) => void): this;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export type ForkFn = (modulePath: URL, args: string[], options: ForkOptions) => WorkerProcess;

export interface ProcessPoolOptions {
  /** Upper bound on worker processes (default: available parallelism) */
  maxWorkers?: number;
  /** Node flags for workers, e.g. a loader for TypeScript tool modules */
  execArgv?: string[];
  /** Modules every worker imports at startup */
  preload?: string[];
  /** Worker entry point (default: worker.js next to this file) */
  workerPath?: URL;
  fork?: ForkFn;
  logger?: Logger;
}

interface PendingTask {
  callId: string;
  resolve(result: JsonValue): void;
  reject(err: Error): void;
}

interface WorkerSlot {
  proc: WorkerProcess;
  spawned: boolean;
  exited: boolean;
  tasks: Map<number, PendingTask>;
}

const RUNNING_FROM_SOURCE = import.meta.url.endsWith('.ts');

function defaultWorkerPath(): URL {
  return new URL(RUNNING_FROM_SOURCE ? './worker.ts' : './worker.js', import.meta.url);
}

const defaultFork: ForkFn = (modulePath, args, options) =>
  forkProcess(fileURLToPath(modulePath), args, options);

export class ProcessPool implements WorkerPool {
  readonly kind = 'process' as const;

  private readonly maxWorkers: number;
  private readonly execArgv: string[];
  private readonly preload: string[];
  private readonly workerPath: URL;
  private readonly fork: ForkFn;
  private readonly logger: Logger | undefined;

  private readonly slots: WorkerSlot[] = [];
  private nextTaskId = 1;
  private unavailableReason: string | undefined;
  private closed = false;
  private exitHook: (() => void) | undefined;

  constructor(options: ProcessPoolOptions = {}) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? availableParallelism());
    this.execArgv =
      options.execArgv ?? (RUNNING_FROM_SOURCE ? ['--import', 'tsx'] : []);
    this.preload = options.preload ?? [];
    this.workerPath = options.workerPath ?? defaultWorkerPath();
    this.fork = options.fork ?? defaultFork;
    this.logger = options.logger;
  }

  isAvailable(): boolean {
    return !this.closed && this.unavailableReason === undefined;
  }

  /** Live worker processes */
  get size(): number {
    return this.slots.length;
  }

  submit(unit: ExecutionUnit): Promise<JsonValue> {
    if (this.closed) {
      return Promise.reject(new PoolUnavailableError('process pool is shut down'));
    }
    if (this.unavailableReason !== undefined) {
      return Promise.reject(new PoolUnavailableError(this.unavailableReason));
    }

    let slot: WorkerSlot;
    try {
      slot = this.pickSlot();
    } catch (err) {
      const reason = `failed to start worker process: ${errorMessage(err)}`;
      this.markUnavailable(reason);
      return Promise.reject(new PoolUnavailableError(reason, { cause: err }));
    }

    const taskId = this.nextTaskId++;
    const request: WorkerRequest = {
      type: 'call',
      taskId,
      callId: unit.callId,
      functionName: unit.functionName,
      args: unit.args,
      ...(unit.tool.origin ? { origin: unit.tool.origin } : {}),
    };

    return new Promise<JsonValue>((resolve, reject) => {
      slot.tasks.set(taskId, { callId: unit.callId, resolve, reject });
      slot.proc.channel?.ref();
      try {
        slot.proc.send(request);
      } catch (err) {
        slot.tasks.delete(taskId);
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  async shutdown(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.exitHook) {
      process.off('exit', this.exitHook);
      this.exitHook = undefined;
    }

    for (const slot of this.slots.splice(0)) {
      this.failTasks(slot, new PoolUnavailableError('process pool is shut down'));
      if (!slot.exited) {
        slot.proc.kill();
      }
    }
  }

  private pickSlot(): WorkerSlot {
    const idle = this.slots.find((slot) => slot.tasks.size === 0);
    if (idle) {
      return idle;
    }
    if (this.slots.length < this.maxWorkers) {
      return this.spawn();
    }
    // All busy: least loaded
    return this.slots.reduce((best, slot) => (slot.tasks.size < best.tasks.size ? slot : best));
  }

  private spawn(): WorkerSlot {
    const proc = this.fork(this.workerPath, this.preload, {
      execArgv: this.execArgv,
      serialization: 'json',
      stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
    });
    const slot: WorkerSlot = { proc, spawned: false, exited: false, tasks: new Map() };
    // Only a busy IPC channel keeps the parent alive.
    proc.unref?.();

    proc.on('spawn', () => {
      slot.spawned = true;
    });
    proc.on('message', (message) => this.handleMessage(slot, message));
    proc.on('error', (err) => this.handleError(slot, err));
    proc.on('exit', (code, signal) => this.handleExit(slot, code, signal));

    this.slots.push(slot);
    this.installExitHook();
    this.logger?.debug({ pid: proc.pid, workers: this.slots.length }, 'worker process started');
    return slot;
  }

  private handleMessage(slot: WorkerSlot, message: unknown): void {
    const parsed = WorkerResponseSchema.safeParse(message);
    if (!parsed.success) {
      this.logger?.warn({ pid: slot.proc.pid }, 'ignoring malformed worker message');
      return;
    }
    const task = slot.tasks.get(parsed.data.taskId);
    if (!task) {
      return;
    }
    slot.tasks.delete(parsed.data.taskId);
    if (slot.tasks.size === 0) {
      slot.proc.channel?.unref();
    }
    task.resolve(normalizeResult(parsed.data.result));
  }

  private handleError(slot: WorkerSlot, err: Error): void {
    if (!slot.spawned) {
      // The process never started; no worker will.
      const reason = `failed to start worker process: ${err.message}`;
      this.markUnavailable(reason);
      this.removeSlot(slot);
      this.failTasks(slot, new PoolUnavailableError(reason, { cause: err }));
      return;
    }
    this.logger?.error({ pid: slot.proc.pid, err }, 'worker process error');
    this.removeSlot(slot);
    this.failTasks(slot, err);
    if (!slot.exited) {
      slot.proc.kill();
    }
  }

  private handleExit(slot: WorkerSlot, code: number | null, signal: NodeJS.Signals | null): void {
    slot.exited = true;
    this.removeSlot(slot);
    if (slot.tasks.size > 0) {
      const calls = [...slot.tasks.values()].map((task) => task.callId);
      this.logger?.warn({ pid: slot.proc.pid, code, signal, calls }, 'worker process crashed');
      this.failTasks(slot, new WorkerCrashedError(code, signal));
    }
  }

  private failTasks(slot: WorkerSlot, err: Error): void {
    const tasks = [...slot.tasks.values()];
    slot.tasks.clear();
    for (const task of tasks) {
      task.reject(err);
    }
  }

  private removeSlot(slot: WorkerSlot): void {
    const index = this.slots.indexOf(slot);
    if (index !== -1) {
      this.slots.splice(index, 1);
    }
  }

  private markUnavailable(reason: string): void {
    if (this.unavailableReason === undefined) {
      this.unavailableReason = reason;
      this.logger?.error({ reason }, 'process pool unavailable');
    }
  }

  private installExitHook(): void {
    if (this.exitHook) {
      return;
    }
    this.exitHook = () => {
      for (const slot of this.slots) {
        if (!slot.exited) {
          slot.proc.kill();
        }
      }
    };
    process.once('exit', this.exitHook);
  }
}
