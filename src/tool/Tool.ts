/**
 * Tool — one invocable unit with a name, description and parameter schema.
 *
 * Tools are immutable. Namespacing returns a new Tool; the registry replaces
 * its entry with the copy.
 */

import { ToolNamingError, errorMessage } from '../errors.js';
import type { ToolSchema } from '../types/common.js';
import { createValidator, type AjvValidator } from '../validation/AjvValidator.js';
import {
  bindInvocable,
  invocableFromFunction,
  invokeAsync,
  invokeSync,
  type Invocable,
  type ToolFunction,
  type ToolProxy,
} from './invocable.js';
import {
  buildParameterModel,
  jsonSchemaModel,
  type ParameterModel,
  type ParameterShape,
} from './parameters.js';

/**
 * Where a worker process can find a tool's function: an importable module
 * specifier and a dotted export path (`add`, `Calculator.add`).
 */
export interface ToolOrigin {
  module: string;
  export: string;
}

export interface FunctionToolOptions {
  /** Defaults to the function's own name */
  name?: string;
  description?: string;
  /** zod shape of the argument object; read from the signature when omitted */
  parameters?: ParameterShape;
  namespace?: string;
  origin?: ToolOrigin;
  /** `this` for the call; the signature is still read from `fn` itself */
  receiver?: object;
}

export interface ProxyToolOptions {
  name: string;
  description?: string;
  /** JSON Schema of the argument object */
  parameters?: Record<string, unknown>;
  namespace?: string;
  validator?: AjvValidator;
}

interface ToolInit {
  baseName: string;
  namespace: string | undefined;
  description: string;
  parameters: Record<string, unknown>;
  invocable: Invocable;
  parametersModel: ParameterModel | undefined;
  origin: ToolOrigin | undefined;
}

const ANONYMOUS_NAMES = new Set(['', 'anonymous', '<lambda>']);

let sharedValidator: AjvValidator | undefined;

function defaultValidator(): AjvValidator {
  sharedValidator ??= createValidator();
  return sharedValidator;
}

function functionName(fn: ToolFunction): string {
  return fn.name.replace(/^(bound )+/, '');
}

function functionDescription(fn: ToolFunction): string {
  if ('description' in fn && typeof fn.description === 'string') {
    return fn.description;
  }
  return '';
}

export class Tool {
  readonly baseName: string;
  readonly namespace: string | undefined;
  readonly description: string;
  /** JSON Schema of the argument object; `{}` in passthrough mode */
  readonly parameters: Record<string, unknown>;
  readonly invocable: Invocable;
  readonly parametersModel: ParameterModel | undefined;
  readonly origin: ToolOrigin | undefined;

  private constructor(init: ToolInit) {
    this.baseName = init.baseName;
    this.namespace = init.namespace;
    this.description = init.description;
    this.parameters = init.parameters;
    this.invocable = init.invocable;
    this.parametersModel = init.parametersModel;
    this.origin = init.origin;
  }

  /**
   * Wrap a local function.
   *
   * @throws ToolNamingError when no name is given and the function is anonymous
   */
  static fromFunction(fn: ToolFunction, options: FunctionToolOptions = {}): Tool {
    const baseName = options.name ?? functionName(fn);
    if (ANONYMOUS_NAMES.has(baseName.trim())) {
      throw new ToolNamingError(
        'You must provide a name for anonymous functions when registering them as tools',
      );
    }

    const parametersModel = buildParameterModel(fn, options.parameters);
    const invocable = invocableFromFunction(fn);
    return new Tool({
      baseName,
      namespace: options.namespace,
      description: options.description ?? functionDescription(fn),
      parameters: parametersModel?.jsonSchema ?? {},
      invocable: options.receiver === undefined ? invocable : bindInvocable(invocable, options.receiver),
      parametersModel,
      origin: options.origin,
    });
  }

  /**
   * Wrap a proxy that performs the call elsewhere (MCP server, HTTP API).
   * Arguments are validated against the published JSON Schema.
   */
  static fromProxy(proxy: ToolProxy, options: ProxyToolOptions): Tool {
    if (ANONYMOUS_NAMES.has(options.name.trim())) {
      throw new ToolNamingError('Proxy tools require a name');
    }
    const schema = options.parameters ?? {};
    const parametersModel = jsonSchemaModel(schema, options.validator ?? defaultValidator());

    return new Tool({
      baseName: options.name,
      namespace: options.namespace,
      description: options.description ?? '',
      parameters: parametersModel?.jsonSchema ?? schema,
      invocable: { kind: 'proxy', target: proxy },
      parametersModel,
      origin: undefined,
    });
  }

  /** `namespace.baseName`, or the base name alone */
  get name(): string {
    return this.namespace ? `${this.namespace}.${this.baseName}` : this.baseName;
  }

  get isAsync(): boolean {
    return this.invocable.kind !== 'sync';
  }

  /**
   * Copy of this tool under another namespace.
   *
   * An already-namespaced tool is returned unchanged unless `force` is set.
   * Passing `null` removes the namespace.
   */
  withNamespace(namespace: string | null, options: { force?: boolean } = {}): Tool {
    if (namespace === null) {
      return this.namespace === undefined ? this : this.copy({ namespace: undefined });
    }
    if (this.namespace !== undefined && !options.force) {
      return this;
    }
    if (this.namespace === namespace) {
      return this;
    }
    return this.copy({ namespace });
  }

  getJsonSchema(): ToolSchema {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: this.parameters,
        is_async: this.isAsync,
      },
    };
  }

  /**
   * Validate a call's arguments; passthrough when the tool has no model.
   *
   * @throws ToolValidationError
   */
  validateArgs(args: Record<string, unknown>): Record<string, unknown> {
    return this.parametersModel ? this.parametersModel.validate(args) : args;
  }

  /**
   * Validate and invoke synchronously. Failures come back as
   * `Error executing <name>: <message>`.
   *
   * A sync function that returns a promise hands that promise back as-is.
   */
  run(args: Record<string, unknown> = {}): unknown {
    try {
      if (this.invocable.kind === 'async') {
        throw new Error('async tool must be run with arun()');
      }
      return invokeSync(this.invocable, this.validateArgs(args));
    } catch (err) {
      return this.errorResult(err);
    }
  }

  /**
   * Validate and invoke asynchronously. Never rejects.
   */
  async arun(args: Record<string, unknown> = {}): Promise<unknown> {
    try {
      if (this.invocable.kind === 'sync') {
        throw new Error('asynchronous execution is not implemented for synchronous tools; use run()');
      }
      return await invokeAsync(this.invocable, this.validateArgs(args));
    } catch (err) {
      return this.errorResult(err);
    }
  }

  /**
   * The fixed error-string form reported for a failed call.
   */
  errorResult(err: unknown): string {
    return `Error executing ${this.name}: ${errorMessage(err)}`;
  }

  toString(): string {
    return `Tool(${this.name})`;
  }

  private copy(changes: Partial<ToolInit>): Tool {
    return new Tool({
      baseName: this.baseName,
      namespace: this.namespace,
      description: this.description,
      parameters: this.parameters,
      invocable: this.invocable,
      parametersModel: this.parametersModel,
      origin: this.origin,
      ...changes,
    });
  }
}
