/**
 * Conversation replay for executed tool calls.
 */

import type { ChatMessage, ExecutionResult, JsonValue, ToolCall } from '../types/common.js';

export const MISSING_RESULT = 'No result (tool call was not executed)';

function renderResult(result: JsonValue | undefined): string {
  if (result === undefined) {
    return MISSING_RESULT;
  }
  return typeof result === 'string' ? result : JSON.stringify(result);
}

/**
 * Build the messages that record a batch in a chat history: for every call,
 * the assistant message that requested it followed by the tool's answer.
 *
 * A call without a result is answered with a placeholder instead of failing.
 */
export function recoverToolCallAssistantMessage(
  calls: readonly ToolCall[],
  results: ExecutionResult,
): ChatMessage[] {
  const messages: ChatMessage[] = [];
  for (const call of calls) {
    const result = Object.hasOwn(results, call.id) ? results[call.id] : undefined;
    messages.push({
      role: 'assistant',
      content: null,
      tool_calls: [
        {
          id: call.id,
          type: 'function',
          function: { name: call.function.name, arguments: call.function.arguments },
        },
      ],
    });
    messages.push({
      role: 'tool',
      content: `${call.function.name} --> ${renderResult(result)}`,
      tool_call_id: call.id,
    });
  }
  return messages;
}
