import { describe, it, expect, vi } from 'vitest';
import { ClassInstantiationError } from '../../errors.js';
import type { Tool } from '../../tool/Tool.js';
import { ClassIntegration, resolveModuleSpecifier } from './ClassIntegration.js';

class Calculator {
  static readonly precision = 2;

  static add({ a, b }: { a: number; b: number }): number {
    return a + b;
  }

  static round({ value }: { value: number }): number {
    return Number(value.toFixed(this.precision));
  }

  static _internal(): string {
    return 'hidden';
  }
}

class Counter {
  private count = 0;

  increment({ by = 1 }: { by?: number }): number {
    this.count += by;
    return this.count;
  }

  async current(): Promise<number> {
    return this.count;
  }

  _reset(): void {
    this.count = 0;
  }
}

class LoudCounter extends Counter {
  shout({ word }: { word: string }): string {
    return word.toUpperCase();
  }
}

class NeedsConfig {
  constructor(readonly url: string) {}

  ping(): string {
    return this.url;
  }
}

class RecordingSink {
  readonly tools: Tool[] = [];

  register(tool: Tool, options: { namespace?: string } = {}): Tool {
    const registered = options.namespace ? tool.withNamespace(options.namespace, { force: true }) : tool;
    this.tools.push(registered);
    return registered;
  }
}

function names(tools: Tool[]): string[] {
  return tools.map((tool) => tool.name).sort();
}

describe('ClassIntegration', () => {
  it('registers the public statics of a static-only class', () => {
    const tools = new ClassIntegration(new RecordingSink()).registerTools(Calculator, { namespace: true });

    expect(names(tools)).toEqual(['Calculator.add', 'Calculator.round']);
    const round = tools.find((tool) => tool.baseName === 'round');
    expect(round?.run({ value: 1.23456 })).toBe(1.23);
    expect(round?.origin).toBeUndefined();
  });

  it('gives statics an origin when the module is known', () => {
    const tools = new ClassIntegration(new RecordingSink()).registerTools(Calculator, {
      module: 'file:///srv/calculator.js',
    });

    expect(tools.find((tool) => tool.name === 'add')?.origin).toEqual({
      module: 'file:///srv/calculator.js',
      export: 'Calculator.add',
    });
  });

  it('instantiates classes with instance methods', () => {
    const tools = new ClassIntegration(new RecordingSink()).registerTools(LoudCounter, { namespace: 'counter' });

    expect(names(tools)).toEqual(['counter.current', 'counter.increment', 'counter.shout']);
    const increment = tools.find((tool) => tool.baseName === 'increment');
    expect(increment?.run({ by: 2 })).toBe(2);
    expect(increment?.run({})).toBe(3);
    expect(increment?.parameters).toMatchObject({ type: 'object', properties: { by: { default: 1 } } });
    expect(tools.find((tool) => tool.baseName === 'current')?.isAsync).toBe(true);
  });

  it('registers the methods of an existing instance', async () => {
    const counter = new Counter();
    counter.increment({ by: 5 });

    const tools = new ClassIntegration(new RecordingSink()).registerTools(counter, { namespace: true });

    expect(names(tools)).toEqual(['Counter.current', 'Counter.increment']);
    await expect(tools.find((tool) => tool.baseName === 'current')?.arun()).resolves.toBe(5);
  });

  it('refuses classes that need constructor arguments', () => {
    expect(() => new ClassIntegration(new RecordingSink()).registerTools(NeedsConfig)).toThrow(
      ClassInstantiationError,
    );
  });
});

describe('ClassIntegration.registerModule', () => {
  const mathModule = {
    add: ({ a, b }: { a: number; b: number }) => a + b,
    default: function multiply({ a, b }: { a: number; b: number }) {
      return a * b;
    },
    _private: () => 0,
    VERSION: '1.0.0',
    Calculator,
  };

  it('registers exported functions with origins', async () => {
    const importer = vi.fn(async (_specifier: string) => mathModule);
    const sink = new RecordingSink();

    const tools = await new ClassIntegration(sink, { importer }).registerModule('file:///srv/math-tools.js', {
      namespace: true,
    });

    expect(importer).toHaveBeenCalledWith('file:///srv/math-tools.js');
    expect(names(tools)).toEqual(['math-tools.add', 'math-tools.multiply']);
    expect(tools.find((tool) => tool.baseName === 'multiply')?.origin).toEqual({
      module: 'file:///srv/math-tools.js',
      export: 'default',
    });
  });
});

describe('resolveModuleSpecifier', () => {
  it('turns paths into file URLs and leaves package names alone', () => {
    expect(resolveModuleSpecifier('./tools/math.js', '/srv/app')).toBe('file:///srv/app/tools/math.js');
    expect(resolveModuleSpecifier('/opt/tools.js')).toBe('file:///opt/tools.js');
    expect(resolveModuleSpecifier('some-package/tools')).toBe('some-package/tools');
  });
});
