export { loadConfig, validateConfig, applyDefaults } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export { DEFAULT_CONFIG } from './types.js';
export type {
  RegistryConfig,
  RegistryConfigInput,
  LoggingConfig,
  ExecutorConfig,
  ProcessPoolConfig,
  ThreadPoolConfig,
  HttpConfig,
} from './types.js';
