export { Executor, type ExecutorOptions, type ToolResolver } from './Executor.js';
export { InProcessPool, type InProcessPoolOptions } from './InProcessPool.js';
export { ProcessPool, type ProcessPoolOptions, type ForkFn, type WorkerProcess } from './ProcessPool.js';
export { WorkerRuntime, type ModuleImporter, type WorkerRuntimeOptions } from './WorkerRuntime.js';
export { normalizeResult } from './results.js';
export {
  FALLBACK_POLICIES,
  isFallbackPolicy,
  type ExecutionUnit,
  type FallbackPolicy,
  type WorkerPool,
  type WorkerRequest,
  type WorkerResponse,
} from './types.js';
