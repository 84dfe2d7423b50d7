export { resolveNamespace } from './types.js';
export type { ToolSink, NamespaceOption } from './types.js';

export { McpIntegration, processCallResult } from './mcp/McpIntegration.js';
export type { McpToolSource, McpRegistrationOptions } from './mcp/McpIntegration.js';

export {
  OpenApiIntegration,
  collectOperations,
  operationToolName,
  operationSchema,
  resolveBaseUrl,
} from './openapi/OpenApiIntegration.js';
export type {
  OpenApiIntegrationOptions,
  OpenApiRegistrationOptions,
  OperationSpec,
} from './openapi/OpenApiIntegration.js';
export { loadOpenApiSpec, parseOpenApiDocument, COMMON_SPEC_ENDPOINTS, HTTP_METHODS } from './openapi/OpenApiLoader.js';
export type { FetchFn, HttpMethod, OpenApiDocument, LoadOptions } from './openapi/OpenApiLoader.js';

export { ClassIntegration, resolveModuleSpecifier } from './class/ClassIntegration.js';
export type { ClassLike, ClassRegistrationOptions, ModuleRegistrationOptions } from './class/ClassIntegration.js';
