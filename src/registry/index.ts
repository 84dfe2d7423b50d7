export { ToolRegistry } from './ToolRegistry.js';
export type {
  ToolRegistryOptions,
  RegisterOptions,
  MergeOptions,
  SpinoffOptions,
} from './ToolRegistry.js';
export { createToolRegistry, executorOptionsFromConfig } from './createToolRegistry.js';
export type { CreateToolRegistryOptions } from './createToolRegistry.js';
export { recoverToolCallAssistantMessage, MISSING_RESULT } from './messages.js';
