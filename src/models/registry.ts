// Реестр поддерживаемых моделей эмбеддингов.

// Имена моделей совпадают с именами архивов в бакете.
export const MODEL_NAMES = [
  'fast-all-MiniLM-L6-v2',
  'fast-bge-base-en',
  'fast-bge-small-en',
] as const;

export type EmbeddingModel = (typeof MODEL_NAMES)[number];

// Описание модели.
export interface ModelDescription {
  model: EmbeddingModel;
  dimensions: number;
  description: string;
}

export const SUPPORTED_MODELS: Record<EmbeddingModel, ModelDescription> = {
  'fast-all-MiniLM-L6-v2': {
    model: 'fast-all-MiniLM-L6-v2',
    dimensions: 384,
    description: 'Sentence Transformer all-MiniLM-L6-v2, quantized',
  },
  'fast-bge-base-en': {
    model: 'fast-bge-base-en',
    dimensions: 768,
    description: 'BAAI bge-base-en, quantized',
  },
  'fast-bge-small-en': {
    model: 'fast-bge-small-en',
    dimensions: 384,
    description: 'BAAI bge-small-en, quantized',
  },
};

export const DEFAULT_MODEL: EmbeddingModel = 'fast-bge-small-en';

// Бакет с архивами моделей.
export const DEFAULT_MODEL_BASE_URL = 'https://storage.googleapis.com/qdrant-fastembed';

// Файлы внутри директории модели.
export const TOKENIZER_FILE = 'tokenizer.json';
export const WEIGHTS_FILE = 'model_optimized.onnx';

export function isEmbeddingModel(value: string): value is EmbeddingModel {
  return MODEL_NAMES.some((name) => name === value);
}

// URL архива модели: <baseUrl>/<model>.tar.gz.
export function modelDownloadUrl(
  model: EmbeddingModel,
  baseUrl: string = DEFAULT_MODEL_BASE_URL,
): string {
  return `${baseUrl.replace(/\/+$/, '')}/${model}.tar.gz`;
}
