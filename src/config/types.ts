/**
 * Configuration types for the tool registry runtime.
 */

import type { FallbackPolicy } from '../executor/types.js';
import type { LogLevel } from '../logging/logger.js';
import type { ExecutionMode } from '../types/common.js';

export interface LoggingConfig {
  /** Falls back to LOG_LEVEL, then 'info' */
  level?: LogLevel;
}

export interface ProcessPoolConfig {
  /** Default: available parallelism */
  maxWorkers?: number;
  execArgv: string[];
  /** Modules every worker imports at startup */
  preload: string[];
}

export interface ThreadPoolConfig {
  /** Default: available parallelism */
  concurrency?: number;
}

export interface ExecutorConfig {
  mode: ExecutionMode;
  fallback: FallbackPolicy;
  processPool: ProcessPoolConfig;
  threadPool: ThreadPoolConfig;
}

/**
 * HTTP settings for OpenAPI tools.
 */
export interface HttpConfig {
  timeoutMs: number;
}

export interface RegistryConfig {
  /** Registry name; generated when absent */
  name?: string;
  logging: LoggingConfig;
  executor: ExecutorConfig;
  http: HttpConfig;
}

/**
 * Shape of a config file before defaults are applied.
 */
export interface RegistryConfigInput {
  name?: string;
  logging?: LoggingConfig;
  executor?: Partial<Omit<ExecutorConfig, 'processPool' | 'threadPool'>> & {
    processPool?: Partial<ProcessPoolConfig>;
    threadPool?: ThreadPoolConfig;
  };
  http?: Partial<HttpConfig>;
}

export const DEFAULT_CONFIG: RegistryConfig = {
  logging: {},
  executor: {
    mode: 'process',
    fallback: 'thread',
    processPool: {
      execArgv: [],
      preload: [],
    },
    threadPool: {},
  },
  http: {
    timeoutMs: 30_000,
  },
};
