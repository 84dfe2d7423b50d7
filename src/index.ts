/**
 * tool-registry — register functions, classes, MCP servers and OpenAPI
 * services as tools, and execute batches of model tool calls against them.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors.js';

// Logging
export { createLogger, componentLogger, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logging/logger.js';

// Configuration
export * from './config/index.js';

// Tools
export * from './tool/index.js';

// Validation
export { AjvValidator, createValidator } from './validation/AjvValidator.js';
export type { ValidationResult, ValidatorOptions } from './validation/types.js';

// Execution
export * from './executor/index.js';

// Adapters
export {
  resolveNamespace,
  McpIntegration,
  processCallResult,
  OpenApiIntegration,
  loadOpenApiSpec,
  parseOpenApiDocument,
  ClassIntegration,
  resolveModuleSpecifier,
} from './integrations/index.js';
export type {
  ToolSink,
  NamespaceOption,
  McpToolSource,
  McpRegistrationOptions,
  OpenApiIntegrationOptions,
  OpenApiRegistrationOptions,
  OpenApiDocument,
  FetchFn,
  ClassLike,
  ClassRegistrationOptions,
  ModuleRegistrationOptions,
} from './integrations/index.js';

// Registry
export * from './registry/index.js';
