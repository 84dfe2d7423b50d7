/**
 * Shared shapes for the adapters that turn external tool sources into Tools.
 */

import type { Tool } from '../tool/Tool.js';

/**
 * Where adapters put the tools they build. The registry implements this.
 */
export interface ToolSink {
  register(tool: Tool, options?: { namespace?: string }): Tool;
}

/**
 * `true` takes the namespace the source reports for itself (server name,
 * API title, class name); a string is used as given; `false` registers
 * the tools without a namespace.
 */
export type NamespaceOption = boolean | string;

export function resolveNamespace(option: NamespaceOption | undefined, derived: string | undefined): string | undefined {
  if (typeof option === 'string') {
    return option;
  }
  return option === true ? derived : undefined;
}
