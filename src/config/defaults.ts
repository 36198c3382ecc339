import type { AppConfig } from './schema.js';
import { DEFAULT_MODEL, DEFAULT_MODEL_BASE_URL } from '../models/registry.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  model: {
    name: DEFAULT_MODEL,
    maxLength: 512,
  },
  runtime: {
    executionProviders: [],
  },
  cache: {
    dir: 'local_cache',
    showDownloadProgress: true,
    baseUrl: DEFAULT_MODEL_BASE_URL,
    downloadTimeoutMs: 0,
  },
  batching: {
    batchSize: 512,
    maxConcurrency: 0,
    failFast: false,
  },
};
