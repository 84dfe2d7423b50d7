/**
 * Common type definitions shared across the registry, executor and adapters.
 *
 * The chat shapes follow the OpenAI-compatible tool-calling protocol, which is
 * what the registry consumes (tool calls) and produces (tool schemas and
 * recovered conversation messages).
 */

// ============================================================================
// JSON values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// Tool-calling protocol
// ============================================================================

/**
 * A tool call requested by the model.
 */
export interface ToolCall {
  id: string;
  type?: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  /** Tool calls requested by the assistant. */
  tool_calls?: ToolCall[];
  /** ID of the tool call this message is responding to. */
  tool_call_id?: string;
}

/**
 * OpenAI-format tool description produced for every registered tool.
 */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>; // JSON Schema
    is_async: boolean;
  };
}

/**
 * Per-call results of a batch, keyed by call ID.
 * Failed calls carry an error string instead of a value.
 */
export type ExecutionResult = Record<string, JsonValue>;

export type ExecutionMode = 'process' | 'thread';

export const EXECUTION_MODES: readonly ExecutionMode[] = ['process', 'thread'];

export function isExecutionMode(value: unknown): value is ExecutionMode {
  return value === 'process' || value === 'thread';
}
