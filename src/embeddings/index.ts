// Barrel-файл модуля эмбеддингов.
export type { TextEmbedder, EmbeddingVector } from './types.js';
export type { EmbeddingServiceDeps } from './service.js';
export type { CreateEmbeddingServiceOptions } from './factory.js';

export { EmbeddingService, QUERY_PREFIX, PASSAGE_PREFIX } from './service.js';
export { createEmbeddingService } from './factory.js';
