import { ArtifactStore } from '../artifacts/store.js';
import type { DownloadProgressReporter } from '../artifacts/progress.js';
import { AppConfigSchema } from '../config/schema.js';
import type { AppConfigInput } from '../config/schema.js';
import { Encoder } from '../encoding/encoder.js';
import { HuggingFaceTokenizer } from '../encoding/tokenizer.js';
import { runtimeEnvironment } from '../inference/environment.js';
import { OnnxInference } from '../inference/onnx.js';
import { EmbeddingService } from './service.js';

export interface CreateEmbeddingServiceOptions {
  // Свой репортер прогресса вместо вывода в stderr.
  progress?: DownloadProgressReporter;
}

/**
 * Создание EmbeddingService по конфигурации.
 *
 * Поднимает окружение рантайма, при необходимости скачивает модель в кэш,
 * загружает токенизатор и готовит адаптер инференса.
 */
export async function createEmbeddingService(
  input: AppConfigInput = {},
  options: CreateEmbeddingServiceOptions = {},
): Promise<EmbeddingService> {
  const config = AppConfigSchema.parse(input);

  runtimeEnvironment.initialize({ libraryPath: config.runtime.libraryPath });

  try {
    const store = new ArtifactStore({
      cacheDir: config.cache.dir,
      showDownloadProgress: config.cache.showDownloadProgress,
      baseUrl: config.cache.baseUrl,
      downloadTimeoutMs: config.cache.downloadTimeoutMs,
      progress: options.progress,
    });
    const artifact = await store.resolve(config.model.name);

    const tokenizer = HuggingFaceTokenizer.fromFile(
      artifact.files.tokenizerConfig,
      config.model.maxLength,
    );
    const inference = new OnnxInference({
      modelPath: artifact.files.weightsFile,
      executionProviders: config.runtime.executionProviders,
    });

    return new EmbeddingService({
      model: config.model.name,
      encoder: new Encoder(tokenizer, config.model.maxLength),
      inference,
      environment: runtimeEnvironment,
      defaultBatchSize: config.batching.batchSize,
      scheduling: {
        maxConcurrency: config.batching.maxConcurrency,
        failFast: config.batching.failFast,
      },
      onDestroy: () => inference.release(),
    });
  } catch (error) {
    runtimeEnvironment.destroy();
    throw error;
  }
}
