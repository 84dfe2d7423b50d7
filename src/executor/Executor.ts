/**
 * Executor — runs a batch of tool calls concurrently and returns one result
 * per call ID.
 *
 * A batch goes through four steps: prepare (resolve the tool, parse and
 * validate arguments), pick a pool, submit every unit at once, collect.
 * Nothing thrown by a single call escapes `executeToolCalls`; failures are
 * reported as error strings under that call's ID.
 */

import type { Logger } from 'pino';
import { PoolUnavailableError, errorMessage } from '../errors.js';
import { componentLogger, createLogger } from '../logging/logger.js';
import { isArgumentObject } from '../tool/parameters.js';
import type { Tool } from '../tool/Tool.js';
import {
  isExecutionMode,
  type ExecutionMode,
  type ExecutionResult,
  type JsonValue,
  type ToolCall,
} from '../types/common.js';
import { InProcessPool, type InProcessPoolOptions } from './InProcessPool.js';
import { ProcessPool, type ProcessPoolOptions } from './ProcessPool.js';
import type { ExecutionUnit, FallbackPolicy, WorkerPool } from './types.js';

export interface ExecutorOptions {
  /** Default: 'process' */
  defaultMode?: ExecutionMode;
  /** Default: 'thread' */
  fallback?: FallbackPolicy;
  processPool?: WorkerPool | ProcessPoolOptions;
  threadPool?: WorkerPool | InProcessPoolOptions;
  logger?: Logger;
}

export type ToolResolver = (name: string) => Tool | undefined;

function isWorkerPool(value: WorkerPool | object): value is WorkerPool {
  return 'submit' in value && typeof value.submit === 'function';
}

type Outcome =
  | { unit: ExecutionUnit; ok: true; value: JsonValue }
  | { unit: ExecutionUnit; ok: false; error: unknown };

export class Executor {
  private mode: ExecutionMode;
  private readonly fallback: FallbackPolicy;
  private readonly processPool: WorkerPool;
  private readonly threadPool: WorkerPool;
  private readonly logger: Logger;
  private shutdownPromise: Promise<void> | undefined;

  constructor(options: ExecutorOptions = {}) {
    this.mode = options.defaultMode ?? 'process';
    this.fallback = options.fallback ?? 'thread';
    this.logger = componentLogger(options.logger ?? createLogger(), 'executor');

    const processPool = options.processPool ?? {};
    this.processPool = isWorkerPool(processPool)
      ? processPool
      : new ProcessPool({ ...processPool, logger: this.logger });

    const threadPool = options.threadPool ?? {};
    this.threadPool = isWorkerPool(threadPool) ? threadPool : new InProcessPool(threadPool);
  }

  get executionMode(): ExecutionMode {
    return this.mode;
  }

  setExecutionMode(mode: ExecutionMode): void {
    if (!isExecutionMode(mode)) {
      throw new TypeError(`Invalid execution mode '${String(mode)}'; expected 'process' or 'thread'`);
    }
    this.mode = mode;
  }

  /**
   * Execute a batch. The returned promise settles once every call has a
   * result and never rejects.
   */
  async executeToolCalls(
    calls: readonly ToolCall[],
    resolveTool: ToolResolver,
    mode?: ExecutionMode,
  ): Promise<ExecutionResult> {
    const results = new Map<string, JsonValue>();
    const units = new Map<string, ExecutionUnit>();

    for (const call of calls) {
      const prepared = this.prepare(call, resolveTool);
      if (typeof prepared === 'string') {
        units.delete(call.id);
        results.set(call.id, prepared);
      } else {
        results.delete(call.id);
        units.set(call.id, prepared);
      }
    }

    let chosen = mode ?? this.mode;
    if (!isExecutionMode(chosen)) {
      this.logger.warn({ mode: chosen }, 'invalid execution mode, using default');
      chosen = this.mode;
    }

    const batch = [...units.values()];
    this.logger.debug({ calls: calls.length, dispatched: batch.length, mode: chosen }, 'executing batch');

    if (batch.length > 0) {
      try {
        await this.dispatch(batch, chosen, results);
      } catch (err) {
        // Only reachable through a misbehaving pool; keep every call answered.
        this.logger.error({ err }, 'batch dispatch failed');
        for (const unit of batch) {
          if (!results.has(unit.callId)) {
            results.set(unit.callId, `Error executing tool call: ${errorMessage(err)}`);
          }
        }
      }
    }

    // Call ids are model-chosen strings; define keys so `__proto__` stays an own entry.
    const ordered: ExecutionResult = {};
    for (const call of calls) {
      const value = results.has(call.id)
        ? (results.get(call.id) ?? null)
        : 'Error executing tool call: no result';
      Object.defineProperty(ordered, call.id, { value, enumerable: true, writable: true, configurable: true });
    }
    return ordered;
  }

  /**
   * Shut both pools down. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= Promise.all([this.processPool.shutdown(), this.threadPool.shutdown()]).then(
      () => undefined,
    );
    return this.shutdownPromise;
  }

  private prepare(call: ToolCall, resolveTool: ToolResolver): ExecutionUnit | string {
    const functionName = call.function.name;
    const tool = resolveTool(functionName);
    if (tool === undefined) {
      return `Error preparing tool call ${functionName}: Tool '${functionName}' not found`;
    }

    let args: unknown;
    try {
      const raw = call.function.arguments;
      args = raw.trim() === '' ? {} : JSON.parse(raw);
    } catch (err) {
      return `Error preparing tool call ${functionName}: invalid arguments JSON: ${errorMessage(err)}`;
    }
    if (!isArgumentObject(args)) {
      return `Error preparing tool call ${functionName}: arguments must be a JSON object`;
    }

    try {
      return { callId: call.id, functionName, args: tool.validateArgs(args), tool };
    } catch (err) {
      return tool.errorResult(err);
    }
  }

  private async dispatch(
    batch: ExecutionUnit[],
    mode: ExecutionMode,
    results: Map<string, JsonValue>,
  ): Promise<void> {
    if (mode === 'thread') {
      this.collect(await this.submitAll(this.threadPool, batch), results);
      return;
    }

    if (!this.processPool.isAvailable()) {
      await this.fallBack(batch, 'pool is not available', results);
      return;
    }

    const outcomes = await this.submitAll(this.processPool, batch);
    const unrun: ExecutionUnit[] = [];
    let reason = '';
    for (const outcome of outcomes) {
      if (!outcome.ok && outcome.error instanceof PoolUnavailableError) {
        unrun.push(outcome.unit);
        reason = outcome.error.message;
      }
    }
    this.collect(
      outcomes.filter((outcome) => !unrun.includes(outcome.unit)),
      results,
    );

    if (unrun.length > 0) {
      await this.fallBack(unrun, reason, results);
    }
  }

  private async fallBack(units: ExecutionUnit[], reason: string, results: Map<string, JsonValue>): Promise<void> {
    if (this.fallback === 'none') {
      this.logger.warn({ reason, calls: units.length }, 'process pool unavailable, failing calls');
      for (const unit of units) {
        results.set(unit.callId, `Error executing ${unit.functionName}: process pool unavailable: ${reason}`);
      }
      return;
    }

    this.logger.warn({ reason, calls: units.length }, 'process pool unavailable, running calls in-process');
    this.collect(await this.submitAll(this.threadPool, units), results);
  }

  private submitAll(pool: WorkerPool, units: ExecutionUnit[]): Promise<Outcome[]> {
    return Promise.all(
      units.map(async (unit): Promise<Outcome> => {
        try {
          return { unit, ok: true, value: await pool.submit(unit) };
        } catch (error) {
          return { unit, ok: false, error };
        }
      }),
    );
  }

  private collect(outcomes: Outcome[], results: Map<string, JsonValue>): void {
    for (const outcome of outcomes) {
      results.set(
        outcome.unit.callId,
        outcome.ok ? outcome.value : `Error executing tool call: ${errorMessage(outcome.error)}`,
      );
    }
  }
}
