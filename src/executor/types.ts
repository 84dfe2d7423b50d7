/**
 * Types shared by the executor, its pools and the worker process.
 */

import { z } from 'zod';
import type { Tool, ToolOrigin } from '../tool/Tool.js';
import type { ExecutionMode, JsonValue } from '../types/common.js';

/**
 * One prepared tool call, ready for a pool.
 */
export interface ExecutionUnit {
  callId: string;
  functionName: string;
  /** Validated keyword arguments */
  args: Record<string, unknown>;
  tool: Tool;
}

/**
 * A pool that runs execution units.
 *
 * `submit` resolves with the unit's normalized result (error strings
 * included). It rejects only for pool-level failures; `PoolUnavailableError`
 * means the unit never ran.
 */
export interface WorkerPool {
  readonly kind: ExecutionMode;
  isAvailable(): boolean;
  submit(unit: ExecutionUnit): Promise<JsonValue>;
  /** Idempotent */
  shutdown(): Promise<void>;
}

/**
 * What happens to a batch when the process pool cannot take it:
 * re-run the calls without results in-process, or fail just those calls.
 */
export type FallbackPolicy = 'thread' | 'none';

export const FALLBACK_POLICIES: readonly FallbackPolicy[] = ['thread', 'none'];

export function isFallbackPolicy(value: unknown): value is FallbackPolicy {
  return FALLBACK_POLICIES.some((policy) => policy === value);
}

// ============================================================================
// Parent <-> worker messages
// ============================================================================

export const ToolOriginSchema = z.object({
  module: z.string().min(1),
  export: z.string().min(1),
});

export const WorkerRequestSchema = z.object({
  type: z.literal('call'),
  taskId: z.number().int(),
  callId: z.string(),
  functionName: z.string(),
  args: z.record(z.string(), z.unknown()),
  origin: ToolOriginSchema.optional(),
});

export type WorkerRequest = z.infer<typeof WorkerRequestSchema>;

export const WorkerResponseSchema = z.object({
  type: z.literal('result'),
  taskId: z.number().int(),
  callId: z.string(),
  result: z.unknown(),
});

export interface WorkerResponse {
  type: 'result';
  taskId: number;
  callId: string;
  result: JsonValue;
}

export type { ToolOrigin };
