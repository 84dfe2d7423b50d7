import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ToolNamingError } from '../errors.js';
import { Tool } from './Tool.js';
import type { ToolProxy } from './invocable.js';

function add({ a, b }: { a: number; b: number }): number {
  return a + b;
}

async function addLater({ a, b }: { a: number; b: number }): Promise<number> {
  return a + b;
}

describe('Tool.fromFunction', () => {
  it('takes the name from the function', () => {
    const tool = Tool.fromFunction(add);

    expect(tool.name).toBe('add');
    expect(tool.baseName).toBe('add');
    expect(tool.namespace).toBeUndefined();
    expect(tool.description).toBe('');
  });

  it('prefers explicit name and description', () => {
    const tool = Tool.fromFunction(add, { name: 'sum', description: 'Add two numbers' });

    expect(tool.name).toBe('sum');
    expect(tool.description).toBe('Add two numbers');
  });

  it('reads a description property from the function', () => {
    const greet = ({ who }: { who: string }) => `hi ${who}`;
    const tool = Tool.fromFunction(Object.assign(greet, { description: 'Say hi' }));

    expect(tool.name).toBe('greet');
    expect(tool.description).toBe('Say hi');
  });

  it('rejects anonymous functions without a name', () => {
    expect(() => Tool.fromFunction(() => 1)).toThrow(ToolNamingError);
    expect(Tool.fromFunction(() => 1, { name: 'one' }).name).toBe('one');
  });

  it('strips the bound prefix from bound functions', () => {
    expect(Tool.fromFunction(add.bind(null)).name).toBe('add');
  });

  it('detects async functions', () => {
    expect(Tool.fromFunction(add).isAsync).toBe(false);
    expect(Tool.fromFunction(addLater).isAsync).toBe(true);
  });

  it('falls back to passthrough when no model can be built', () => {
    const tool = Tool.fromFunction(function positional(a: number) {
      return a;
    });

    expect(tool.parametersModel).toBeUndefined();
    expect(tool.parameters).toEqual({});
  });
});

describe('getJsonSchema', () => {
  it('describes the tool in function-calling format', () => {
    const tool = Tool.fromFunction(add, {
      description: 'Add two numbers',
      parameters: { a: z.number(), b: z.number() },
      namespace: 'calculator',
    });

    expect(tool.getJsonSchema()).toEqual({
      type: 'function',
      function: {
        name: 'calculator.add',
        description: 'Add two numbers',
        parameters: tool.parameters,
        is_async: false,
      },
    });
    expect(tool.parameters).toMatchObject({ required: ['a', 'b'] });
  });
});

describe('withNamespace', () => {
  const tool = Tool.fromFunction(add);

  it('returns a namespaced copy', () => {
    const namespaced = tool.withNamespace('math');

    expect(namespaced.name).toBe('math.add');
    expect(tool.name).toBe('add');
    expect(namespaced.invocable).toBe(tool.invocable);
  });

  it('leaves an existing namespace alone unless forced', () => {
    const namespaced = tool.withNamespace('math');

    expect(namespaced.withNamespace('other')).toBe(namespaced);
    expect(namespaced.withNamespace('other', { force: true }).name).toBe('other.add');
  });

  it('clears the namespace with null', () => {
    expect(tool.withNamespace('math').withNamespace(null).name).toBe('add');
  });

  it('keeps base names containing dots intact', () => {
    const dotted = Tool.fromFunction(add, { name: 'v1.add' }).withNamespace('math');

    expect(dotted.name).toBe('math.v1.add');
    expect(dotted.namespace).toBe('math');
    expect(dotted.baseName).toBe('v1.add');
  });
});

describe('run / arun', () => {
  it('runs sync tools and async tools with identical results', async () => {
    expect(Tool.fromFunction(add).run({ a: 2, b: 3 })).toBe(5);
    await expect(Tool.fromFunction(addLater).arun({ a: 2, b: 3 })).resolves.toBe(5);
  });

  it('reports thrown errors as strings', () => {
    const fail = Tool.fromFunction(function explode() {
      throw new Error('boom');
    });

    expect(fail.run()).toBe('Error executing explode: boom');
  });

  it('reports validation failures as strings', () => {
    const tool = Tool.fromFunction(add, { parameters: { a: z.number(), b: z.number() } });

    expect(tool.run({ a: 1, b: 'two' })).toMatch(/^Error executing add: b: /);
  });

  it('reports rejected promises as strings', async () => {
    const fail = Tool.fromFunction(async function rejectIt() {
      throw new Error('nope');
    });

    await expect(fail.arun()).resolves.toBe('Error executing rejectIt: nope');
  });

  it('refuses to run async tools synchronously', () => {
    expect(Tool.fromFunction(addLater).run({ a: 1, b: 1 })).toBe(
      'Error executing addLater: async tool must be run with arun()',
    );
  });

  it('refuses arun on sync tools', async () => {
    await expect(Tool.fromFunction(add).arun({ a: 1, b: 1 })).resolves.toMatch(
      /^Error executing add: asynchronous execution is not implemented/,
    );
  });
});

describe('Tool.fromProxy', () => {
  const proxy: ToolProxy = {
    async callAsync(args) {
      return { echoed: args };
    },
  };

  const schema = {
    type: 'object',
    properties: { text: { type: 'string' } },
    required: ['text'],
  };

  it('is async and validates against the JSON Schema', async () => {
    const tool = Tool.fromProxy(proxy, { name: 'echo', description: 'Echo', parameters: schema });

    expect(tool.isAsync).toBe(true);
    expect(tool.parameters).toEqual(schema);
    await expect(tool.arun({ text: 'hi' })).resolves.toEqual({ echoed: { text: 'hi' } });
    await expect(tool.arun({})).resolves.toBe(
      'Error executing echo: (root): Missing required property: text',
    );
  });

  it('uses the sync protocol when the proxy has one', () => {
    const tool = Tool.fromProxy({ ...proxy, call: () => 'sync' }, { name: 'echo' });
    expect(tool.run({})).toBe('sync');
  });

  it('reports a missing sync protocol from run', () => {
    const tool = Tool.fromProxy(proxy, { name: 'echo' });
    expect(tool.run({})).toBe('Error executing echo: proxy has no synchronous call protocol');
  });
});
