/**
 * Worker-side request handling.
 *
 * Resolves a request's origin to a function by importing its module and
 * walking the dotted export path, then runs it through the same invocation
 * step as the in-process pool.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../errors.js';
import { bindInvocable, invocableFromFunction, type Invocable } from '../tool/invocable.js';
import type { JsonValue } from '../types/common.js';
import { missingCallableResult, runInvocation } from './invoke.js';
import { WorkerRequestSchema, type ToolOrigin, type WorkerResponse } from './types.js';

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface WorkerRuntimeOptions {
  importer?: ModuleImporter;
  logger?: Logger;
}

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

export class WorkerRuntime {
  private readonly importer: ModuleImporter;
  private readonly logger: Logger | undefined;
  private readonly modules = new Map<string, Promise<unknown>>();

  constructor(options: WorkerRuntimeOptions = {}) {
    this.importer = options.importer ?? defaultImporter;
    this.logger = options.logger;
  }

  /**
   * Import modules ahead of the first call.
   */
  async preload(specifiers: readonly string[]): Promise<void> {
    await Promise.all(specifiers.map((specifier) => this.load(specifier)));
  }

  /**
   * Handle one message from the parent. Returns `undefined` for messages
   * that are not call requests.
   */
  async handle(message: unknown): Promise<WorkerResponse | undefined> {
    const parsed = WorkerRequestSchema.safeParse(message);
    if (!parsed.success) {
      this.logger?.warn('ignoring malformed request');
      return undefined;
    }
    const request = parsed.data;
    return {
      type: 'result',
      taskId: request.taskId,
      callId: request.callId,
      result: await this.execute(request.functionName, request.origin, request.args),
    };
  }

  async execute(
    functionName: string,
    origin: ToolOrigin | undefined,
    args: Record<string, unknown>,
  ): Promise<JsonValue> {
    if (origin === undefined) {
      return missingCallableResult(functionName);
    }
    let invocable: Invocable | undefined;
    try {
      invocable = await this.resolve(origin);
    } catch (err) {
      return `Error executing ${functionName}: ${errorMessage(err)}`;
    }
    return runInvocation(functionName, invocable, args);
  }

  /**
   * The function an origin points at, bound to the object holding it.
   * `undefined` when the export path does not lead to a function.
   */
  async resolve(origin: ToolOrigin): Promise<Invocable | undefined> {
    let holder: unknown = undefined;
    let current: unknown = await this.load(origin.module);

    for (const segment of origin.export.split('.')) {
      if (current === null || (typeof current !== 'object' && typeof current !== 'function')) {
        return undefined;
      }
      holder = current;
      current = Reflect.get(current, segment);
    }

    if (!isFunction(current)) {
      return undefined;
    }
    return bindInvocable(invocableFromFunction(current), holder);
  }

  private load(specifier: string): Promise<unknown> {
    let loaded = this.modules.get(specifier);
    if (loaded === undefined) {
      loaded = this.importer(specifier);
      // A failed import is retried on the next call.
      void loaded.catch(() => this.modules.delete(specifier));
      this.modules.set(specifier, loaded);
    }
    return loaded;
  }
}
