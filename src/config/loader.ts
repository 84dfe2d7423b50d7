/**
 * Configuration loader.
 *
 * Loads config from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME}, ${VAR_NAME:-default})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Logger } from 'pino';
import { ConfigValidationError, errorMessage } from '../errors.js';
import { FALLBACK_POLICIES, isFallbackPolicy } from '../executor/types.js';
import { isLogLevel, LOG_LEVELS } from '../logging/logger.js';
import { isRecord } from '../schema/json-schema.js';
import { isExecutionMode } from '../types/common.js';
import { DEFAULT_CONFIG, type RegistryConfig, type RegistryConfigInput } from './types.js';

export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  logger?: Logger;
}

/**
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;
const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

function substituteEnvVars(value: string, logger?: Logger): string | number {
  const hasPlaceholder = value.search(ENV_VAR_PATTERN) !== -1;
  const result = value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    logger?.warn({ variable: varName }, 'environment variable is not set and has no default');
    return '';
  });
  // `maxWorkers: ${MAX_WORKERS:-4}` should still read as a number.
  return hasPlaceholder && NUMBER_PATTERN.test(result) ? Number(result) : result;
}

export function substituteEnvVarsRecursive(obj: unknown, logger?: Logger): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, logger);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVarsRecursive(item, logger));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value, logger);
    }
    return result;
  }
  return obj;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function validateLoggingConfig(config: unknown, path = 'logging'): void {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  if (config.level !== undefined && !isLogLevel(config.level)) {
    throw new ConfigValidationError(`level must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.level`, config.level);
  }
}

function validateExecutorConfig(config: unknown, path = 'executor'): void {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  if (config.mode !== undefined && !isExecutionMode(config.mode)) {
    throw new ConfigValidationError('mode must be one of: process, thread', `${path}.mode`, config.mode);
  }
  if (config.fallback !== undefined && !isFallbackPolicy(config.fallback)) {
    throw new ConfigValidationError(
      `fallback must be one of: ${FALLBACK_POLICIES.join(', ')}`,
      `${path}.fallback`,
      config.fallback,
    );
  }

  const { processPool, threadPool } = config;
  if (processPool !== undefined) {
    if (!isRecord(processPool)) {
      throw new ConfigValidationError('must be an object', `${path}.processPool`, processPool);
    }
    if (processPool.maxWorkers !== undefined && !isPositiveInteger(processPool.maxWorkers)) {
      throw new ConfigValidationError(
        'maxWorkers must be a positive integer',
        `${path}.processPool.maxWorkers`,
        processPool.maxWorkers,
      );
    }
    for (const key of ['execArgv', 'preload'] as const) {
      if (processPool[key] !== undefined && !isStringArray(processPool[key])) {
        throw new ConfigValidationError(
          `${key} must be an array of strings`,
          `${path}.processPool.${key}`,
          processPool[key],
        );
      }
    }
  }

  if (threadPool !== undefined) {
    if (!isRecord(threadPool)) {
      throw new ConfigValidationError('must be an object', `${path}.threadPool`, threadPool);
    }
    if (threadPool.concurrency !== undefined && !isPositiveInteger(threadPool.concurrency)) {
      throw new ConfigValidationError(
        'concurrency must be a positive integer',
        `${path}.threadPool.concurrency`,
        threadPool.concurrency,
      );
    }
  }
}

function validateHttpConfig(config: unknown, path = 'http'): void {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  if (config.timeoutMs !== undefined && !isPositiveInteger(config.timeoutMs)) {
    throw new ConfigValidationError('timeoutMs must be a positive integer', `${path}.timeoutMs`, config.timeoutMs);
  }
}

/**
 * Validate a parsed config file.
 */
export function validateConfig(config: unknown): asserts config is RegistryConfigInput {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.name !== undefined && (typeof config.name !== 'string' || config.name === '')) {
    throw new ConfigValidationError('name must be a non-empty string', 'name', config.name);
  }
  if (config.logging !== undefined) {
    validateLoggingConfig(config.logging);
  }
  if (config.executor !== undefined) {
    validateExecutorConfig(config.executor);
  }
  if (config.http !== undefined) {
    validateHttpConfig(config.http);
  }
}

/**
 * Apply defaults; values from `input` win.
 */
export function applyDefaults(input: RegistryConfigInput): RegistryConfig {
  const config: RegistryConfig = {
    logging: { ...DEFAULT_CONFIG.logging, ...input.logging },
    executor: {
      ...DEFAULT_CONFIG.executor,
      ...input.executor,
      processPool: { ...DEFAULT_CONFIG.executor.processPool, ...input.executor?.processPool },
      threadPool: { ...DEFAULT_CONFIG.executor.threadPool, ...input.executor?.threadPool },
    },
    http: { ...DEFAULT_CONFIG.http, ...input.http },
  };
  if (input.name !== undefined) {
    config.name = input.name;
  }
  return config;
}

/**
 * Load configuration from a YAML file. A missing file yields the defaults.
 *
 * @throws ConfigValidationError
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<RegistryConfig> {
  const configPath = options.configPath ?? process.env.CONFIG_PATH ?? './config.yaml';
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    options.logger?.warn({ path: absolutePath }, 'config file not found, using defaults');
    return applyDefaults({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(`failed to parse config file: ${errorMessage(err)}`, absolutePath, content);
  }

  // An empty file parses to null.
  const substituted = substituteEnvVarsRecursive(parsed ?? {}, options.logger);

  validateConfig(substituted);
  return applyDefaults(substituted);
}
