/**
 * Config Module - 配置管理模块
 *
 * @module Config
 * @version 1.0.0
 */

export {
  MemoryConfigManager,
  DEFAULT_MEMORY_CONFIG,
  CONFIG_DIR_NAME,
  memoryConfigSchema,
  configFromEnvironment,
  mergeConfig,
  validateConfig,
} from './memory-config.js';

export type {
  MemoryConfig,
  MemoryConfigOverrides,
  MemoryConfigManagerOptions,
} from './memory-config.js';
