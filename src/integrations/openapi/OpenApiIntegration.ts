/**
 * OpenAPI integration — registers the operations of an HTTP API as tools.
 *
 * Each GET/POST/PUT/DELETE operation becomes a proxy tool whose parameters
 * combine the operation's query/path/header parameters with the properties
 * of its JSON request body.
 */

import type { Logger } from 'pino';
import { HttpToolError } from '../../errors.js';
import { componentLogger } from '../../logging/logger.js';
import { isRecord } from '../../schema/json-schema.js';
import { collapseRepeatedSegments, normalizeToolName } from '../../tool/normalize.js';
import { Tool } from '../../tool/Tool.js';
import type { ToolProxy } from '../../tool/invocable.js';
import { resolveNamespace, type NamespaceOption, type ToolSink } from '../types.js';
import {
  HTTP_METHODS,
  loadOpenApiSpec,
  type FetchFn,
  type HttpMethod,
  type OpenApiDocument,
  type OperationObject,
  type ParameterObject,
} from './OpenApiLoader.js';

export interface OpenApiIntegrationOptions {
  fetch?: FetchFn;
  /** Per-request timeout, for loading and for calls */
  timeoutMs?: number;
  logger?: Logger;
}

export interface OpenApiRegistrationOptions {
  /** Overrides the document's first server URL */
  baseUrl?: string;
  namespace?: NamespaceOption;
}

/**
 * One API operation, ready to become a tool.
 */
export interface OperationSpec {
  name: string;
  description: string;
  method: HttpMethod;
  path: string;
  parameters: ParameterObject[];
  /** JSON Schema of the tool's argument object */
  schema: Record<string, unknown>;
  /** The JSON body is not an object and travels as the `body` argument */
  wholeBody: boolean;
}

/**
 * Tool name for an operation: its operationId, or `<method>_<path>`, normalized
 * with repeated segments collapsed.
 */
export function operationToolName(method: HttpMethod, path: string, operation: OperationObject): string {
  const raw = operation.operationId ?? `${method}_${path}`;
  const normalized = normalizeToolName(raw);
  return collapseRepeatedSegments(
    operation.operationId === undefined ? normalized.replace(/^_+|_+$/g, '') : normalized,
  );
}

/**
 * Operation parameters override path-level ones with the same name and location.
 */
function mergeParameters(pathLevel: ParameterObject[], operationLevel: ParameterObject[]): ParameterObject[] {
  const merged = new Map<string, ParameterObject>();
  for (const param of [...pathLevel, ...operationLevel]) {
    merged.set(`${param.in}:${param.name}`, param);
  }
  return [...merged.values()];
}

function bodySchemaOf(operation: OperationObject): Record<string, unknown> | undefined {
  return operation.requestBody?.content?.['application/json']?.schema;
}

function parameterSchema(param: ParameterObject): Record<string, unknown> {
  const schema: Record<string, unknown> = { ...(param.schema ?? { type: 'string' }) };
  if (param.description !== undefined && schema.description === undefined) {
    schema.description = param.description;
  }
  return schema;
}

/**
 * JSON Schema of an operation's argument object.
 */
export function operationSchema(parameters: ParameterObject[], operation: OperationObject): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required = new Set<string>();

  for (const param of parameters) {
    properties[param.name] = parameterSchema(param);
    if (param.required || param.in === 'path') {
      required.add(param.name);
    }
  }

  const bodySchema = bodySchemaOf(operation);
  if (bodySchema !== undefined) {
    if (isRecord(bodySchema.properties)) {
      Object.assign(properties, bodySchema.properties);
      if (Array.isArray(bodySchema.required)) {
        for (const name of bodySchema.required) {
          if (typeof name === 'string') required.add(name);
        }
      }
    } else {
      // Non-object body: passed whole as `body`
      properties.body = bodySchema;
      if (operation.requestBody?.required) required.add('body');
    }
  }

  return {
    type: 'object',
    properties,
    ...(required.size > 0 ? { required: [...required] } : {}),
  };
}

/**
 * Every registrable operation of a document.
 */
export function collectOperations(document: OpenApiDocument): OperationSpec[] {
  const operations: OperationSpec[] = [];
  for (const [path, item] of Object.entries(document.paths)) {
    for (const method of HTTP_METHODS) {
      const operation = item[method];
      if (operation === undefined) continue;
      const parameters = mergeParameters(item.parameters ?? [], operation.parameters ?? []);
      const body = bodySchemaOf(operation);
      operations.push({
        name: operationToolName(method, path, operation),
        description: operation.description ?? operation.summary ?? '',
        method,
        path,
        parameters,
        schema: operationSchema(parameters, operation),
        wholeBody: body !== undefined && !isRecord(body.properties),
      });
    }
  }
  return operations;
}

/**
 * Base URL for calls: the explicit option, else the first server (resolved
 * against the document's own URL when relative), else the document's origin.
 */
export function resolveBaseUrl(source: string, document: OpenApiDocument, explicit?: string): string {
  const isRemote = /^https?:\/\//i.test(source);
  const server = explicit ?? document.servers?.[0]?.url;
  if (server === undefined || server === '') {
    return isRemote ? new URL(source).origin : '';
  }
  if (isRemote && !/^[a-z][a-z0-9+.-]*:\/\//i.test(server)) {
    return new URL(server, source).href.replace(/\/+$/, '');
  }
  return server.replace(/\/+$/, '');
}

function appendQuery(search: URLSearchParams, key: string, value: unknown): void {
  if (value === undefined || value === null) return;
  if (Array.isArray(value)) {
    for (const item of value) appendQuery(search, key, item);
    return;
  }
  search.append(key, typeof value === 'object' ? JSON.stringify(value) : String(value));
}

export class OpenApiIntegration {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number | undefined;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly registry: ToolSink,
    options: OpenApiIntegrationOptions = {},
  ) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ? componentLogger(options.logger, 'openapi') : undefined;
  }

  /**
   * Load the document and register one tool per operation.
   */
  async registerTools(source: string, options: OpenApiRegistrationOptions = {}): Promise<Tool[]> {
    const document = await loadOpenApiSpec(source, {
      fetch: this.fetchFn,
      ...(this.timeoutMs === undefined ? {} : { timeoutMs: this.timeoutMs }),
      ...(this.logger ? { logger: this.logger } : {}),
    });
    const baseUrl = resolveBaseUrl(source, document, options.baseUrl);
    const namespace = resolveNamespace(options.namespace, document.info?.title);

    const registered = collectOperations(document).map((operation) =>
      this.registry.register(this.createTool(baseUrl, operation), namespace ? { namespace } : {}),
    );
    this.logger?.info({ source, baseUrl, tools: registered.length }, 'registered OpenAPI tools');
    return registered;
  }

  createTool(baseUrl: string, operation: OperationSpec): Tool {
    const proxy: ToolProxy = {
      callAsync: (args) => this.call(baseUrl, operation, args),
    };
    return Tool.fromProxy(proxy, {
      name: operation.name,
      description: operation.description,
      parameters: operation.schema,
    });
  }

  private async call(baseUrl: string, operation: OperationSpec, args: Record<string, unknown>): Promise<unknown> {
    const remaining: Record<string, unknown> = { ...args };
    const headers: Record<string, string> = { accept: 'application/json' };
    const search = new URLSearchParams();
    let path = operation.path;

    for (const param of operation.parameters) {
      const value = remaining[param.name];
      if (value === undefined) continue;
      switch (param.in) {
        case 'path':
          path = path.replaceAll(`{${param.name}}`, encodeURIComponent(String(value)));
          break;
        case 'header':
          headers[param.name] = String(value);
          break;
        case 'query':
          appendQuery(search, param.name, value);
          break;
        case 'cookie':
          // not sent
          break;
      }
      delete remaining[param.name];
    }

    let body: string | undefined;
    if (operation.method === 'get') {
      for (const [key, value] of Object.entries(remaining)) appendQuery(search, key, value);
    } else {
      body = JSON.stringify(operation.wholeBody ? (remaining.body ?? null) : remaining);
      headers['content-type'] = 'application/json';
    }

    const query = search.toString();
    const url = `${baseUrl}${path}${query ? `?${query}` : ''}`;
    this.logger?.debug({ method: operation.method, url }, 'calling OpenAPI operation');

    const response = await this.fetchFn(url, {
      method: operation.method.toUpperCase(),
      headers,
      ...(body === undefined ? {} : { body }),
      ...(this.timeoutMs === undefined ? {} : { signal: AbortSignal.timeout(this.timeoutMs) }),
    });
    const text = await response.text();
    if (!response.ok) {
      throw new HttpToolError(response.status, response.statusText, text);
    }
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('json')) {
      return text === '' ? null : JSON.parse(text);
    }
    return text;
  }
}
