// Ошибки пайплайна эмбеддингов.

export type EmbeddingErrorCode =
  | 'ARTIFACT_DOWNLOAD'
  | 'ARTIFACT_EXTRACT'
  | 'FILESYSTEM'
  | 'ENCODING'
  | 'TENSOR_SHAPE'
  | 'INFERENCE';

// Базовый класс всех ошибок библиотеки.
export abstract class EmbeddingError extends Error {
  abstract readonly code: EmbeddingErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// Не удалось скачать архив модели: сетевой сбой или не-2xx ответ.
export class ArtifactDownloadError extends EmbeddingError {
  readonly code = 'ARTIFACT_DOWNLOAD' as const;

  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// Архив повреждён или не распаковался целиком.
export class ArtifactExtractError extends EmbeddingError {
  readonly code = 'ARTIFACT_EXTRACT' as const;
}

// Директория кэша недоступна для чтения или записи.
export class FilesystemError extends EmbeddingError {
  readonly code = 'FILESYSTEM' as const;

  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// Токенизатор не смог закодировать вход.
export class EncodingError extends EmbeddingError {
  readonly code = 'ENCODING' as const;
}

// Размерности тензоров не согласованы.
export class TensorShapeError extends EmbeddingError {
  readonly code = 'TENSOR_SHAPE' as const;
}

// Сбой сессии или прогона модели.
export class InferenceError extends EmbeddingError {
  readonly code = 'INFERENCE' as const;
}

// Сообщение из произвольного значения, пойманного в catch.
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
