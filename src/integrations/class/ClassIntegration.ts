/**
 * Class and module integration.
 *
 * A class whose public methods are all static registers its statics. Any
 * other class is instantiated without arguments and its public methods are
 * registered bound to the instance; an instance registers the same way.
 * Members whose names start with `_` are private by convention and skipped.
 *
 * Static methods and module exports can be given an origin, which is what
 * lets the process pool run them. Instance methods cannot: their receiver
 * lives in this process only.
 */

import { isAbsolute, resolve as resolvePath, basename, extname } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Logger } from 'pino';
import { ClassInstantiationError } from '../../errors.js';
import type { ModuleImporter } from '../../executor/WorkerRuntime.js';
import { componentLogger } from '../../logging/logger.js';
import { Tool } from '../../tool/Tool.js';
import type { ToolFunction } from '../../tool/invocable.js';
import { resolveNamespace, type NamespaceOption, type ToolSink } from '../types.js';

export type ClassLike = new (...args: never[]) => object;

export interface ClassRegistrationOptions {
  namespace?: NamespaceOption;
  /**
   * Module specifier the class is exported from under its own name.
   * Gives static methods an origin so they can run in worker processes.
   */
  module?: string;
}

export interface ModuleRegistrationOptions {
  namespace?: NamespaceOption;
}

const FUNCTION_OWN_KEYS = new Set(['length', 'name', 'prototype', 'caller', 'arguments']);

function isPublic(key: string): boolean {
  return !key.startsWith('_');
}

function isClass(value: unknown): value is ClassLike {
  return typeof value === 'function' && Function.prototype.toString.call(value).startsWith('class');
}

function isToolFunction(value: unknown): value is ToolFunction {
  return typeof value === 'function' && !isClass(value);
}

/**
 * Public methods found along a prototype chain, nearest definition first.
 */
function prototypeMethods(start: object | null, stopAt: object | null): Map<string, ToolFunction> {
  const methods = new Map<string, ToolFunction>();
  for (let current = start; current !== null && current !== stopAt; current = Object.getPrototypeOf(current)) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (key === 'constructor' || !isPublic(key) || methods.has(key)) continue;
      // Accessors are not methods; never trigger getters.
      const value: unknown = Object.getOwnPropertyDescriptor(current, key)?.value;
      if (isToolFunction(value)) {
        methods.set(key, value);
      }
    }
  }
  return methods;
}

function staticMethods(cls: ClassLike): Map<string, ToolFunction> {
  const methods = new Map<string, ToolFunction>();
  for (
    let current: object | null = cls;
    current !== null && current !== Function.prototype;
    current = Object.getPrototypeOf(current)
  ) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (FUNCTION_OWN_KEYS.has(key) || !isPublic(key) || methods.has(key)) continue;
      const value: unknown = Object.getOwnPropertyDescriptor(current, key)?.value;
      if (isToolFunction(value)) {
        methods.set(key, value);
      }
    }
  }
  return methods;
}

/**
 * Module specifier as importable from anywhere: file paths become file URLs,
 * package names and URLs pass through.
 */
export function resolveModuleSpecifier(specifier: string, cwd: string = process.cwd()): string {
  if (specifier.startsWith('.') || isAbsolute(specifier)) {
    return pathToFileURL(resolvePath(cwd, specifier)).href;
  }
  return specifier;
}

function moduleBaseName(specifier: string): string {
  const path = specifier.startsWith('file:') ? new URL(specifier).pathname : specifier;
  return basename(path, extname(path));
}

export class ClassIntegration {
  private readonly logger: Logger | undefined;
  private readonly importer: ModuleImporter;

  constructor(
    private readonly registry: ToolSink,
    options: { logger?: Logger; importer?: ModuleImporter } = {},
  ) {
    this.logger = options.logger ? componentLogger(options.logger, 'class') : undefined;
    this.importer = options.importer ?? ((specifier) => import(specifier));
  }

  /**
   * Register the methods of a class or an instance.
   *
   * @throws ClassInstantiationError when a class with instance methods cannot
   *   be constructed without arguments
   */
  registerTools(target: ClassLike | object, options: ClassRegistrationOptions = {}): Tool[] {
    if (isClass(target)) {
      const className = target.name;
      const namespace = resolveNamespace(options.namespace, className);
      const instanceMethods = prototypeMethods(target.prototype, Object.prototype);

      if (instanceMethods.size === 0) {
        const registered = [...staticMethods(target)].map(([key, method]) =>
          this.add(method, key, namespace, {
            ...(options.module === undefined
              ? {}
              : { origin: { module: options.module, export: `${className}.${key}` } }),
            receiver: target,
          }),
        );
        this.logger?.debug({ class: className, tools: registered.length }, 'registered static methods');
        return registered;
      }

      return this.registerInstance(this.instantiate(target), resolveNamespace(options.namespace, className));
    }

    return this.registerInstance(target, resolveNamespace(options.namespace, target.constructor.name));
  }

  /**
   * Import a module and register every exported function, each with an
   * origin pointing back at its export.
   */
  async registerModule(specifier: string, options: ModuleRegistrationOptions = {}): Promise<Tool[]> {
    const resolved = resolveModuleSpecifier(specifier);
    const loaded: unknown = await this.importer(resolved);
    if (loaded === null || typeof loaded !== 'object') {
      return [];
    }

    const namespace = resolveNamespace(options.namespace, moduleBaseName(resolved));
    const registered: Tool[] = [];
    for (const [key, value] of Object.entries(loaded)) {
      if (!isPublic(key) || !isToolFunction(value)) continue;
      const name = key === 'default' && value.name !== '' ? value.name : key;
      registered.push(this.add(value, name, namespace, { origin: { module: resolved, export: key } }));
    }
    this.logger?.debug({ module: resolved, tools: registered.length }, 'registered module exports');
    return registered;
  }

  private instantiate(cls: ClassLike): object {
    if (cls.length > 0) {
      throw new ClassInstantiationError(cls.name);
    }
    try {
      return new cls();
    } catch (err) {
      throw new ClassInstantiationError(cls.name, err);
    }
  }

  private registerInstance(instance: object, namespace: string | undefined): Tool[] {
    const methods = prototypeMethods(Object.getPrototypeOf(instance), Object.prototype);
    // Function-valued fields (arrow functions) count as methods too.
    for (const [key, value] of Object.entries(instance)) {
      if (isPublic(key) && isToolFunction(value) && !methods.has(key)) {
        methods.set(key, value);
      }
    }

    const registered = [...methods].map(([key, method]) => this.add(method, key, namespace, { receiver: instance }));
    this.logger?.debug(
      { class: instance.constructor.name, tools: registered.length },
      'registered instance methods',
    );
    return registered;
  }

  private add(
    fn: ToolFunction,
    name: string,
    namespace: string | undefined,
    extra: { origin?: { module: string; export: string }; receiver?: object },
  ): Tool {
    const tool = Tool.fromFunction(fn, { name, ...extra });
    return this.registry.register(tool, namespace ? { namespace } : {});
  }
}
