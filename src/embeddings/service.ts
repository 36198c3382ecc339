// Фасад: текст → нормализованные эмбеддинги.
import { BatchScheduler } from '../batching/scheduler.js';
import type { BatchSchedulerOptions } from '../batching/scheduler.js';
import type { Encoder } from '../encoding/encoder.js';
import { TensorShapeError } from '../errors.js';
import type { InferencePort } from '../inference/types.js';
import type { RuntimeEnvironment } from '../inference/environment.js';
import { SUPPORTED_MODELS } from '../models/registry.js';
import type { EmbeddingModel } from '../models/registry.js';
import { extractEmbeddings } from '../pooling/normalize.js';
import { assembleTensors } from '../tensors/assembler.js';
import type { EmbeddingVector, TextEmbedder } from './types.js';

// Инструкции задачи, которые ожидают поддерживаемые модели.
export const QUERY_PREFIX = 'query: ';
export const PASSAGE_PREFIX = 'passage: ';

export interface EmbeddingServiceDeps {
  model: EmbeddingModel;
  encoder: Encoder;
  inference: InferencePort;
  // Окружение движка; destroy() сервиса его закрывает.
  environment?: RuntimeEnvironment;
  // Размер батча, когда вызывающий его не передал.
  defaultBatchSize?: number;
  scheduling?: BatchSchedulerOptions;
  // Вызывается в destroy() для освобождения ресурсов адаптера.
  onDestroy?: () => void;
}

export class EmbeddingService implements TextEmbedder {
  readonly model: EmbeddingModel;
  private readonly encoder: Encoder;
  private readonly inference: InferencePort;
  private readonly environment: RuntimeEnvironment | undefined;
  private readonly defaultBatchSize: number | undefined;
  private readonly scheduler: BatchScheduler<EmbeddingVector>;
  private readonly onDestroy: (() => void) | undefined;

  constructor(deps: EmbeddingServiceDeps) {
    this.model = deps.model;
    this.encoder = deps.encoder;
    this.inference = deps.inference;
    this.environment = deps.environment;
    this.defaultBatchSize = deps.defaultBatchSize;
    this.onDestroy = deps.onDestroy;
    this.scheduler = new BatchScheduler((batch) => this.embedBatch(batch), deps.scheduling);
  }

  get dimensions(): number {
    return SUPPORTED_MODELS[this.model].dimensions;
  }

  async embed(inputs: readonly string[], batchSize?: number): Promise<EmbeddingVector[]> {
    return this.scheduler.runAll(inputs, batchSize ?? this.defaultBatchSize);
  }

  async queryEmbed(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedBatch([QUERY_PREFIX + text]);
    if (!vector) {
      throw new TensorShapeError('Query produced no embedding');
    }
    return vector;
  }

  async passageEmbed(inputs: readonly string[], batchSize?: number): Promise<EmbeddingVector[]> {
    return this.embed(inputs.map((input) => PASSAGE_PREFIX + input), batchSize);
  }

  destroy(): void {
    this.onDestroy?.();
    this.environment?.destroy();
  }

  // Пайплайн одного батча: токены → тензоры → модель → пулинг и нормализация.
  private async embedBatch(batch: readonly string[]): Promise<EmbeddingVector[]> {
    const sequences = await this.encoder.encode(batch);
    const inputs = assembleTensors(sequences, this.encoder.maxLength);
    const hidden = await this.inference.infer(inputs);
    const embeddings = extractEmbeddings(hidden);

    if (embeddings.length !== batch.length) {
      throw new TensorShapeError(
        `Model returned ${embeddings.length} embeddings for ${batch.length} inputs`,
      );
    }
    return embeddings;
  }
}
