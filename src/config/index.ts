// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  ModelConfigSchema,
  RuntimeConfigSchema,
  CacheConfigSchema,
  BatchingConfigSchema,
} from './schema.js';

export type {
  AppConfig,
  AppConfigInput,
  ModelConfig,
  RuntimeConfig,
  CacheConfig,
  BatchingConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export {
  loadConfig,
  resolveConfigPath,
  resolveEnvVars,
  deepMerge,
  applyOverrides,
  CONFIG_FILE_NAME,
} from './loader.js';
