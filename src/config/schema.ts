import { z } from 'zod';
import { DEFAULT_MODEL, DEFAULT_MODEL_BASE_URL, MODEL_NAMES } from '../models/registry.js';

// Схема выбора модели.
export const ModelConfigSchema = z.object({
  name: z.enum(MODEL_NAMES).default(DEFAULT_MODEL),
  // Длина последовательности после усечения и паддинга.
  maxLength: z.number().int().positive().default(512),
});

// Схема рантайма инференса.
export const RuntimeConfigSchema = z.object({
  // Передаются движку как есть.
  executionProviders: z.array(z.string()).default([]),
  // Переопределение пути к бинарникам рантайма.
  libraryPath: z.string().optional(),
});

// Схема кэша артефактов.
export const CacheConfigSchema = z.object({
  dir: z.string().default('local_cache'),
  showDownloadProgress: z.boolean().default(true),
  baseUrl: z.string().url().default(DEFAULT_MODEL_BASE_URL),
  // 0 — без таймаута.
  downloadTimeoutMs: z.number().int().nonnegative().default(0),
});

// Схема батчинга.
export const BatchingConfigSchema = z.object({
  batchSize: z.number().int().positive().default(512),
  // 0 — без ограничения, по одному воркеру на батч.
  maxConcurrency: z.number().int().nonnegative().default(0),
  // Не брать новые батчи после первой ошибки.
  failFast: z.boolean().default(false),
});

// Корневая схема конфигурации.
export const AppConfigSchema = z.object({
  model: ModelConfigSchema.default(() => ({
    name: DEFAULT_MODEL,
    maxLength: 512,
  })),
  runtime: RuntimeConfigSchema.default(() => ({
    executionProviders: [],
  })),
  cache: CacheConfigSchema.default(() => ({
    dir: 'local_cache',
    showDownloadProgress: true,
    baseUrl: DEFAULT_MODEL_BASE_URL,
    downloadTimeoutMs: 0,
  })),
  batching: BatchingConfigSchema.default(() => ({
    batchSize: 512,
    maxConcurrency: 0,
    failFast: false,
  })),
});

// Типы, выведенные из схем.
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type BatchingConfig = z.infer<typeof BatchingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

// Частичная конфигурация, которую принимает программный API.
export type AppConfigInput = z.input<typeof AppConfigSchema>;
