// Публичный API библиотеки.
export type {
  EmbeddingErrorCode,
} from './errors.js';
export {
  EmbeddingError,
  ArtifactDownloadError,
  ArtifactExtractError,
  FilesystemError,
  EncodingError,
  TensorShapeError,
  InferenceError,
} from './errors.js';

export type { EmbeddingModel, ModelDescription } from './models/registry.js';
export {
  MODEL_NAMES,
  SUPPORTED_MODELS,
  DEFAULT_MODEL,
  isEmbeddingModel,
  modelDownloadUrl,
} from './models/registry.js';

export * from './config/index.js';
export * from './artifacts/index.js';
export * from './encoding/index.js';
export * from './inference/index.js';
export * from './embeddings/index.js';

export type {
  TensorBuffer,
  Int64TensorBuffer,
  Float32TensorBuffer,
  AssembledInputs,
} from './tensors/assembler.js';
export { assembleTensors } from './tensors/assembler.js';
export { normalize, extractEmbeddings, EPSILON } from './pooling/normalize.js';
export type { BatchJob, BatchSchedulerOptions, ChunkProcessor } from './batching/scheduler.js';
export { BatchScheduler, partition, DEFAULT_BATCH_SIZE } from './batching/scheduler.js';
