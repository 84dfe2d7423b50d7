/**
 * ToolRegistry — a named collection of tools with namespace-aware merge and
 * spinoff, plus batch execution of tool calls against its tools.
 *
 * Tool names are `namespace.baseName` or `baseName`. Sub-registries are not
 * stored; they are read off the namespaces of the current tools.
 *
 * Registry mutation is not synchronized with execution: do not register,
 * merge or spin off while a batch is running against the registry.
 */

import { randomBytes } from 'node:crypto';
import type { Logger } from 'pino';
import { InvalidMergeTargetError, SpinoffError } from '../errors.js';
import { Executor, type ExecutorOptions } from '../executor/Executor.js';
import {
  ClassIntegration,
  type ClassLike,
  type ClassRegistrationOptions,
  type ModuleRegistrationOptions,
} from '../integrations/class/ClassIntegration.js';
import {
  McpIntegration,
  type McpRegistrationOptions,
  type McpToolSource,
} from '../integrations/mcp/McpIntegration.js';
import {
  OpenApiIntegration,
  type OpenApiIntegrationOptions,
  type OpenApiRegistrationOptions,
} from '../integrations/openapi/OpenApiIntegration.js';
import type { ToolSink } from '../integrations/types.js';
import { componentLogger, createLogger } from '../logging/logger.js';
import { normalizeToolName } from '../tool/normalize.js';
import { Tool, type ToolOrigin } from '../tool/Tool.js';
import type { ToolFunction } from '../tool/invocable.js';
import type { ParameterShape } from '../tool/parameters.js';
import type { ChatMessage, ExecutionMode, ExecutionResult, ToolCall, ToolSchema } from '../types/common.js';
import { recoverToolCallAssistantMessage } from './messages.js';

export interface ToolRegistryOptions {
  /** Defaults to `reg_` plus four hex characters */
  name?: string;
  /** A shared executor; the registry builds its own from `executorOptions` otherwise */
  executor?: Executor;
  executorOptions?: Omit<ExecutorOptions, 'logger'>;
  /** Options for OpenAPI tools registered later */
  http?: Omit<OpenApiIntegrationOptions, 'logger'>;
  logger?: Logger;
}

export interface RegisterOptions {
  name?: string;
  description?: string;
  namespace?: string;
  /** zod shape of the argument object, for functions */
  parameters?: ParameterShape;
  origin?: ToolOrigin;
}

export interface MergeOptions {
  /** Keep this registry's tool on a name conflict */
  keepExisting?: boolean;
  /** Re-prefix every tool with its origin registry's name */
  forceNamespace?: boolean;
}

export interface SpinoffOptions {
  /** Keep the namespace on the spun-off tools */
  retainNamespace?: boolean;
}

function randomRegistryName(): string {
  return `reg_${randomBytes(2).toString('hex')}`;
}

export class ToolRegistry implements ToolSink {
  readonly name: string;
  private tools = new Map<string, Tool>();
  private readonly executor: Executor;
  private readonly executorOptions: Omit<ExecutorOptions, 'logger'>;
  private readonly sharedExecutor: boolean;
  private readonly http: Omit<OpenApiIntegrationOptions, 'logger'>;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;

  constructor(options: ToolRegistryOptions = {}) {
    this.name = options.name ?? randomRegistryName();
    this.baseLogger = options.logger ?? createLogger();
    this.logger = componentLogger(this.baseLogger, 'registry').child({ registry: this.name });
    this.executorOptions = options.executorOptions ?? {};
    this.sharedExecutor = options.executor !== undefined;
    this.executor = options.executor ?? new Executor({ ...this.executorOptions, logger: this.baseLogger });
    this.http = options.http ?? {};
  }

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Register a function or a built tool. A tool already registered under the
   * same name is replaced.
   */
  register(toolOrFn: Tool | ToolFunction, options: RegisterOptions = {}): Tool {
    const namespace = options.namespace ? normalizeToolName(options.namespace) : undefined;

    let tool: Tool;
    if (toolOrFn instanceof Tool) {
      tool = namespace ? toolOrFn.withNamespace(namespace, { force: true }) : toolOrFn;
    } else {
      tool = Tool.fromFunction(toolOrFn, {
        ...(options.name === undefined ? {} : { name: options.name }),
        ...(options.description === undefined ? {} : { description: options.description }),
        ...(options.parameters === undefined ? {} : { parameters: options.parameters }),
        ...(options.origin === undefined ? {} : { origin: options.origin }),
        ...(namespace === undefined ? {} : { namespace }),
      });
    }

    if (this.tools.has(tool.name)) {
      this.logger.debug({ tool: tool.name }, 'replacing registered tool');
    }
    this.tools.set(tool.name, tool);
    return tool;
  }

  /**
   * Register every tool of an MCP server.
   */
  registerFromMcp(source: McpToolSource, options: McpRegistrationOptions = {}): Promise<Tool[]> {
    return new McpIntegration(this, { logger: this.baseLogger }).registerTools(source, options);
  }

  /**
   * Register every operation of an OpenAPI document.
   */
  registerFromOpenApi(source: string, options: OpenApiRegistrationOptions = {}): Promise<Tool[]> {
    return new OpenApiIntegration(this, { ...this.http, logger: this.baseLogger }).registerTools(source, options);
  }

  /**
   * Register the methods of a class or instance.
   */
  registerFromClass(target: ClassLike | object, options: ClassRegistrationOptions = {}): Tool[] {
    return new ClassIntegration(this, { logger: this.baseLogger }).registerTools(target, options);
  }

  /**
   * Import a module and register its exported functions. Tools registered
   * this way can run in worker processes.
   */
  registerFromModule(specifier: string, options: ModuleRegistrationOptions = {}): Promise<Tool[]> {
    return new ClassIntegration(this, { logger: this.baseLogger }).registerModule(specifier, options);
  }

  // ==========================================================================
  // Namespace algebra
  // ==========================================================================

  /**
   * Namespaces in use, read off the current tool names.
   */
  get subRegistries(): Set<string> {
    const namespaces = new Set<string>();
    for (const tool of this.tools.values()) {
      if (tool.namespace !== undefined) {
        namespaces.add(tool.namespace);
      }
    }
    return namespaces;
  }

  /**
   * Move the tools of another registry into this one.
   *
   * Before merging, unnamespaced tools on both sides are prefixed with their
   * registry's normalized name. With `forceNamespace`, every tool is
   * re-prefixed with its origin registry's name instead. `other` is left
   * holding its prefixed tools.
   *
   * @throws InvalidMergeTargetError
   */
  merge(other: ToolRegistry, options: MergeOptions = {}): void {
    if (!(other instanceof ToolRegistry)) {
      throw new InvalidMergeTargetError();
    }
    if (other === this) {
      return;
    }

    const force = options.forceNamespace ?? false;
    this.prefixTools(force);
    other.prefixTools(force);

    let added = 0;
    for (const [name, tool] of other.tools) {
      if (options.keepExisting && this.tools.has(name)) continue;
      this.tools.set(name, tool);
      added++;
    }
    this.logger.debug(
      { from: other.name, added, keepExisting: options.keepExisting ?? false, force },
      'merged registry',
    );
  }

  /**
   * Move the tools under one namespace into a new registry named `prefix`.
   *
   * Unless `retainNamespace` is set, the namespace is stripped from the moved
   * tools and this registry is reduced (see `reduceNamespace`).
   *
   * @throws SpinoffError when no tool carries the namespace
   */
  spinoff(prefix: string, options: SpinoffOptions = {}): ToolRegistry {
    const namespace = normalizeToolName(prefix);
    const moved = [...this.tools.values()].filter((tool) => tool.namespace === namespace);
    if (moved.length === 0) {
      throw new SpinoffError(prefix);
    }

    const spun = new ToolRegistry({
      name: prefix,
      ...(this.sharedExecutor ? { executor: this.executor } : { executorOptions: this.executorOptions }),
      http: this.http,
      logger: this.baseLogger,
    });
    for (const tool of moved) {
      this.tools.delete(tool.name);
      spun.tools.set(tool.name, tool);
    }

    if (!options.retainNamespace) {
      spun.reduceNamespace();
      this.reduceNamespace();
    }
    this.logger.debug({ prefix, tools: moved.length }, 'spun off registry');
    return spun;
  }

  /**
   * Strip the namespace when exactly one remains. Skipped when stripping it
   * would collide with an unnamespaced tool.
   *
   * @returns whether the namespace was stripped
   */
  reduceNamespace(): boolean {
    const namespaces = this.subRegistries;
    if (namespaces.size !== 1) {
      return false;
    }

    const reduced = new Map<string, Tool>();
    for (const tool of this.tools.values()) {
      const stripped = tool.withNamespace(null);
      if (reduced.has(stripped.name)) {
        this.logger.warn({ tool: stripped.name }, 'namespace not reduced: name collision');
        return false;
      }
      reduced.set(stripped.name, stripped);
    }
    this.tools = reduced;
    return true;
  }

  private prefixTools(force: boolean): void {
    const namespace = normalizeToolName(this.name);
    const prefixed = new Map<string, Tool>();
    for (const tool of this.tools.values()) {
      const renamed = tool.withNamespace(namespace, { force });
      prefixed.set(renamed.name, renamed);
    }
    this.tools = prefixed;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * The function behind a tool. Proxy tools (MCP, OpenAPI) give a function
   * that performs the remote call.
   */
  getCallable(name: string): ToolFunction | undefined {
    const tool = this.tools.get(name);
    if (tool === undefined) {
      return undefined;
    }
    const { invocable } = tool;
    if (invocable.kind === 'proxy') {
      return (args: Record<string, unknown>) => invocable.target.callAsync(args);
    }
    return invocable.fn;
  }

  /** Alias of `getCallable` */
  get(name: string): ToolFunction | undefined {
    return this.getCallable(name);
  }

  getAvailableTools(): string[] {
    return [...this.tools.keys()];
  }

  listTools(): Tool[] {
    return [...this.tools.values()];
  }

  /**
   * Tool descriptions for a chat request: all tools, or the named one.
   * An unknown name gives an empty list.
   */
  getToolsJson(name?: string): ToolSchema[] {
    if (name !== undefined) {
      const tool = this.tools.get(name);
      return tool ? [tool.getJsonSchema()] : [];
    }
    return this.listTools().map((tool) => tool.getJsonSchema());
  }

  toString(): string {
    return JSON.stringify(this.getToolsJson(), null, 2);
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  get executionMode(): ExecutionMode {
    return this.executor.executionMode;
  }

  /**
   * @throws TypeError for a mode other than 'process' or 'thread'
   */
  setExecutionMode(mode: ExecutionMode): void {
    this.executor.setExecutionMode(mode);
  }

  /**
   * Run a batch of tool calls concurrently. Resolves with one result per
   * call ID; failed calls carry an error string. Never rejects.
   */
  executeToolCalls(calls: readonly ToolCall[], mode?: ExecutionMode): Promise<ExecutionResult> {
    return this.executor.executeToolCalls(calls, (name) => this.tools.get(name), mode);
  }

  recoverToolCallAssistantMessage(calls: readonly ToolCall[], results: ExecutionResult): ChatMessage[] {
    return recoverToolCallAssistantMessage(calls, results);
  }

  /**
   * Release the executor's pools. Idempotent.
   */
  shutdown(): Promise<void> {
    return this.executor.shutdown();
  }
}
