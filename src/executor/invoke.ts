/**
 * The worker execution step, shared by the in-process pool and the worker
 * process runtime.
 */

import { errorMessage } from '../errors.js';
import { invokeAsync, type Invocable } from '../tool/invocable.js';
import type { JsonValue } from '../types/common.js';
import { normalizeResult } from './results.js';

export function missingCallableResult(functionName: string): string {
  return `Error: Tool '${functionName}' not found or callable is None`;
}

/**
 * Invoke, await, normalize. Never rejects.
 */
export async function runInvocation(
  functionName: string,
  invocable: Invocable | undefined,
  args: Record<string, unknown>,
): Promise<JsonValue> {
  if (invocable === undefined) {
    return missingCallableResult(functionName);
  }
  try {
    return normalizeResult(await invokeAsync(invocable, args));
  } catch (err) {
    return `Error executing ${functionName}: ${errorMessage(err)}`;
  }
}
