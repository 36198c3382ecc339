import type { EmbeddingModel } from '../models/registry.js';

// L2-нормализованный вектор фиксированной размерности.
export type EmbeddingVector = number[];

// Интерфейс генератора эмбеддингов текста.
export interface TextEmbedder {
  readonly model: EmbeddingModel;

  // Размерность вектора.
  readonly dimensions: number;

  // Эмбеддинги без префикса, батчами по batchSize.
  embed(inputs: readonly string[], batchSize?: number): Promise<EmbeddingVector[]>;

  // Эмбеддинг поискового запроса (префикс "query: ").
  queryEmbed(text: string): Promise<EmbeddingVector>;

  // Эмбеддинги документов (префикс "passage: ").
  passageEmbed(inputs: readonly string[], batchSize?: number): Promise<EmbeddingVector[]>;

  // Освобождает ресурсы движка.
  destroy(): void;
}
