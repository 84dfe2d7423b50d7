import { describe, it, expect } from 'vitest';
import type { ToolCall } from '../types/common.js';
import { recoverToolCallAssistantMessage } from './messages.js';

const calls: ToolCall[] = [
  { id: 'call_1', function: { name: 'add', arguments: '{"a":1,"b":2}' } },
  { id: 'call_2', function: { name: 'lookup', arguments: '{}' } },
  { id: 'call_3', function: { name: 'divide', arguments: '{"a":1,"b":0}' } },
];

describe('recoverToolCallAssistantMessage', () => {
  it('pairs each call with its result', () => {
    const messages = recoverToolCallAssistantMessage(calls.slice(0, 1), { call_1: 3 });

    expect(messages).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'call_1', type: 'function', function: { name: 'add', arguments: '{"a":1,"b":2}' } },
        ],
      },
      { role: 'tool', content: 'add --> 3', tool_call_id: 'call_1' },
    ]);
  });

  it('renders strings as-is and other values as JSON', () => {
    const messages = recoverToolCallAssistantMessage(calls, {
      call_1: 3,
      call_2: { city: 'Oslo', tags: ['a'] },
      call_3: 'Error executing divide: division by zero',
    });

    expect(messages.filter((m) => m.role === 'tool').map((m) => m.content)).toEqual([
      'add --> 3',
      'lookup --> {"city":"Oslo","tags":["a"]}',
      'divide --> Error executing divide: division by zero',
    ]);
  });

  it('fills in a placeholder for calls without a result', () => {
    const messages = recoverToolCallAssistantMessage(calls.slice(1, 2), {});

    expect(messages[1]).toEqual({
      role: 'tool',
      content: 'lookup --> No result (tool call was not executed)',
      tool_call_id: 'call_2',
    });
  });

  it('reads a __proto__ call ID as an ordinary key', () => {
    const protoCall: ToolCall = { id: '__proto__', function: { name: 'add', arguments: '{}' } };
    const results: Record<string, number> = {};
    Object.defineProperty(results, '__proto__', { value: 7, enumerable: true });

    expect(recoverToolCallAssistantMessage([protoCall], results)[1]?.content).toBe('add --> 7');
    expect(recoverToolCallAssistantMessage([protoCall], {})[1]?.content).toBe(
      'add --> No result (tool call was not executed)',
    );
  });
});
