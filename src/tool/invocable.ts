/**
 * The three ways a tool can be invoked.
 *
 * A tool wraps either a synchronous function, an async function, or a proxy
 * object speaking an async call protocol (remote MCP/HTTP tools). Call sites
 * switch on `kind` instead of sniffing the callable at runtime.
 */

import { types } from 'node:util';

/**
 * Any function. Tools call it with one keyword-argument object; the
 * parameter type is `never` so functions with typed argument objects are
 * accepted, and arguments are validated before the call.
 */
export type ToolFunction = (...args: never[]) => unknown;

/**
 * An object that performs a tool call on the caller's behalf.
 */
export interface ToolProxy {
  /** Synchronous entry point, when the transport has one. */
  call?(args: Record<string, unknown>): unknown;
  callAsync(args: Record<string, unknown>): Promise<unknown>;
}

export type Invocable =
  | { kind: 'sync'; fn: ToolFunction }
  | { kind: 'async'; fn: ToolFunction }
  | { kind: 'proxy'; target: ToolProxy };

/**
 * Classify a function by whether it was declared `async`.
 */
export function invocableFromFunction(fn: ToolFunction): Invocable {
  return types.isAsyncFunction(fn) ? { kind: 'async', fn } : { kind: 'sync', fn };
}

/**
 * Bind a function invocable to `receiver`, keeping its kind. A bound async
 * function no longer reads as async, so classify before binding.
 */
export function bindInvocable(invocable: Invocable, receiver: unknown): Invocable {
  if (invocable.kind === 'proxy') {
    return invocable;
  }
  return { kind: invocable.kind, fn: invocable.fn.bind(receiver) };
}

/**
 * Call the wrapped function with one argument object.
 */
export function callFunction(fn: ToolFunction, args: Record<string, unknown>): unknown {
  const result: unknown = Reflect.apply(fn, undefined, [args]);
  return result;
}

/**
 * Invoke without awaiting. The result may still be a promise when a sync
 * function returns one.
 */
export function invokeSync(invocable: Invocable, args: Record<string, unknown>): unknown {
  switch (invocable.kind) {
    case 'sync':
    case 'async':
      return callFunction(invocable.fn, args);
    case 'proxy':
      if (invocable.target.call === undefined) {
        throw new Error('proxy has no synchronous call protocol');
      }
      return invocable.target.call(args);
  }
}

/**
 * Invoke and await the result, whatever the invocable's kind.
 */
export async function invokeAsync(invocable: Invocable, args: Record<string, unknown>): Promise<unknown> {
  switch (invocable.kind) {
    case 'sync':
    case 'async':
      return await callFunction(invocable.fn, args);
    case 'proxy':
      return await invocable.target.callAsync(args);
  }
}
