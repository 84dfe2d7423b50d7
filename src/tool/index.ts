export { Tool } from './Tool.js';
export type { ToolOrigin, FunctionToolOptions, ProxyToolOptions } from './Tool.js';
export { invocableFromFunction, bindInvocable, invokeSync, invokeAsync } from './invocable.js';
export type { ToolFunction, ToolProxy, Invocable } from './invocable.js';
export { normalizeToolName, collapseRepeatedSegments } from './normalize.js';
export { buildParameterModel, jsonSchemaModel, zodParameterModel, isArgumentObject } from './parameters.js';
export type { ParameterShape, ParameterModel } from './parameters.js';
export { readSignature } from './signature.js';
export type { SignatureParameter, LiteralValue } from './signature.js';
