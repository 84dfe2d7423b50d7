/**
 * MCP integration — registers the tools of a Model Context Protocol server.
 *
 * Registration opens one session to list the server's tools. Each tool is
 * registered as a proxy that opens its own short-lived session per call, so
 * registered tools hold no connection between batches.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport, type StdioServerParameters } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolResultSchema,
  type CallToolResult,
  type Tool as McpToolDefinition,
} from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';
import { McpToolError } from '../../errors.js';
import { componentLogger } from '../../logging/logger.js';
import { isRecord } from '../../schema/json-schema.js';
import { Tool } from '../../tool/Tool.js';
import type { ToolProxy } from '../../tool/invocable.js';
import { resolveNamespace, type NamespaceOption, type ToolSink } from '../types.js';

/**
 * A server URL (streamable HTTP, or SSE when the path ends in `/sse`),
 * the command line of a stdio server, or a factory for any other transport.
 */
export type McpToolSource =
  | string
  | URL
  | StdioServerParameters
  | (() => Transport | Promise<Transport>);

export interface McpRegistrationOptions {
  namespace?: NamespaceOption;
}

const CLIENT_INFO = { name: 'tool-registry', version: '0.1.0' };

function createTransport(source: McpToolSource): Promise<Transport> | Transport {
  if (typeof source === 'function') {
    return source();
  }
  if (typeof source === 'string' || source instanceof URL) {
    const url = new URL(source);
    return url.pathname.replace(/\/+$/, '').endsWith('/sse')
      ? new SSEClientTransport(url)
      : new StreamableHTTPClientTransport(url);
  }
  return new StdioClientTransport(source);
}

/**
 * Reduce one content item to a plain value.
 */
function contentValue(item: CallToolResult['content'][number]): unknown {
  switch (item.type) {
    case 'text':
      return item.text;
    case 'image':
    case 'audio':
      return { type: item.type, data: item.data, mimeType: item.mimeType };
    case 'resource':
      if ('text' in item.resource) {
        return item.resource.text;
      }
      return { type: 'blob', data: item.resource.blob, mimeType: item.resource.mimeType ?? null };
    case 'resource_link':
      return { type: 'resource_link', uri: item.uri, name: item.name };
  }
}

/**
 * The value a tool call produced: one item, a list of items, or the
 * structured content when there is no content list.
 *
 * @throws McpToolError when the server flags the result as an error
 */
export function processCallResult(toolName: string, result: CallToolResult): unknown {
  if (result.isError) {
    const detail = result.content
      .map((item) => (item.type === 'text' ? item.text : `[${item.type}]`))
      .join('\n');
    throw new McpToolError(toolName, detail || 'unknown error');
  }
  const values = result.content.map(contentValue);
  if (values.length === 0) {
    return result.structuredContent ?? null;
  }
  return values.length === 1 ? values[0] : values;
}

function propertyNames(inputSchema: McpToolDefinition['inputSchema']): string[] | undefined {
  return isRecord(inputSchema.properties) ? Object.keys(inputSchema.properties) : undefined;
}

export class McpIntegration {
  private readonly logger: Logger | undefined;

  constructor(
    private readonly registry: ToolSink,
    options: { logger?: Logger } = {},
  ) {
    this.logger = options.logger ? componentLogger(options.logger, 'mcp') : undefined;
  }

  /**
   * List the server's tools and register a proxy for each.
   */
  async registerTools(source: McpToolSource, options: McpRegistrationOptions = {}): Promise<Tool[]> {
    const { definitions, serverName } = await this.withSession(source, async (client) => {
      const definitions: McpToolDefinition[] = [];
      let cursor: string | undefined;
      do {
        const page = await client.listTools(cursor === undefined ? {} : { cursor });
        definitions.push(...page.tools);
        cursor = page.nextCursor;
      } while (cursor !== undefined);
      return { definitions, serverName: client.getServerVersion()?.name };
    });

    const namespace = resolveNamespace(options.namespace, serverName);
    const registered = definitions.map((definition) =>
      this.registry.register(this.createTool(source, definition), namespace ? { namespace } : {}),
    );
    this.logger?.info({ server: serverName, tools: registered.length }, 'registered MCP tools');
    return registered;
  }

  private createTool(source: McpToolSource, definition: McpToolDefinition): Tool {
    const accepted = propertyNames(definition.inputSchema);
    const proxy: ToolProxy = {
      callAsync: (args) =>
        this.withSession(source, async (client) => {
          const filtered = accepted
            ? Object.fromEntries(Object.entries(args).filter(([key]) => accepted.includes(key)))
            : args;
          const raw = await client.callTool({ name: definition.name, arguments: filtered });
          return processCallResult(definition.name, CallToolResultSchema.parse(raw));
        }),
    };

    return Tool.fromProxy(proxy, {
      name: definition.name,
      description: definition.description ?? '',
      parameters: { ...definition.inputSchema },
    });
  }

  private async withSession<T>(source: McpToolSource, work: (client: Client) => Promise<T>): Promise<T> {
    const client = new Client(CLIENT_INFO);
    await client.connect(await createTransport(source));
    try {
      return await work(client);
    } finally {
      await client.close().catch((err: unknown) => {
        this.logger?.warn({ err }, 'failed to close MCP session');
      });
    }
  }
}
