/**
 * Build a registry from a config file.
 */

import type { Logger } from 'pino';
import { loadConfig } from '../config/loader.js';
import type { RegistryConfig } from '../config/types.js';
import { createLogger } from '../logging/logger.js';
import type { ExecutorOptions } from '../executor/Executor.js';
import { ToolRegistry } from './ToolRegistry.js';

export interface CreateToolRegistryOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Already-loaded config; skips reading the file */
  config?: RegistryConfig;
  /** Overrides the config's registry name */
  name?: string;
  logger?: Logger;
}

export function executorOptionsFromConfig(config: RegistryConfig): Omit<ExecutorOptions, 'logger'> {
  const { mode, fallback, processPool, threadPool } = config.executor;
  return {
    defaultMode: mode,
    fallback,
    processPool: {
      execArgv: processPool.execArgv,
      preload: processPool.preload,
      ...(processPool.maxWorkers === undefined ? {} : { maxWorkers: processPool.maxWorkers }),
    },
    threadPool: threadPool.concurrency === undefined ? {} : { concurrency: threadPool.concurrency },
  };
}

export async function createToolRegistry(options: CreateToolRegistryOptions = {}): Promise<ToolRegistry> {
  const config =
    options.config ??
    (await loadConfig({
      ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
      ...(options.logger === undefined ? {} : { logger: options.logger }),
    }));

  const logger =
    options.logger ?? createLogger(config.logging.level === undefined ? {} : { level: config.logging.level });
  const name = options.name ?? config.name;

  return new ToolRegistry({
    ...(name === undefined ? {} : { name }),
    executorOptions: executorOptionsFromConfig(config),
    http: { timeoutMs: config.http.timeoutMs },
    logger,
  });
}
