// Кэш артефактов модели: имя модели → заполненная локальная директория.
import { createWriteStream } from 'node:fs';
import { mkdir, mkdtemp, rename, rm, stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  ArtifactDownloadError,
  ArtifactExtractError,
  FilesystemError,
  errorMessage,
} from '../errors.js';
import {
  DEFAULT_MODEL_BASE_URL,
  TOKENIZER_FILE,
  WEIGHTS_FILE,
  modelDownloadUrl,
} from '../models/registry.js';
import type { EmbeddingModel } from '../models/registry.js';
import { unpackArchive } from './archive.js';
import { ConsoleDownloadProgress, ProgressTracker } from './progress.js';
import type { DownloadProgressReporter } from './progress.js';

// Локальная копия модели.
export interface ModelArtifact {
  model: EmbeddingModel;
  localPath: string;
  files: {
    tokenizerConfig: string;
    weightsFile: string;
  };
}

export interface ArtifactStoreOptions {
  cacheDir: string;
  showDownloadProgress?: boolean;
  baseUrl?: string;
  // 0 или undefined — без таймаута.
  downloadTimeoutMs?: number;
  progress?: DownloadProgressReporter;
}

// Разворачивает ~ в начале пути в домашнюю директорию.
export function expandHome(path: string): string {
  if (path.startsWith('~/') || path === '~') {
    return path.replace(/^~/, homedir());
  }
  return path;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// true — путь существует, false — ENOENT, остальные ошибки пробрасываются.
async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw new FilesystemError(`Cannot access ${path}: ${errorMessage(error)}`, path, { cause: error });
  }
}

function parseContentLength(header: string | null): number | null {
  if (header === null) {
    return null;
  }
  const value = Number.parseInt(header, 10);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

export function describeArtifact(model: EmbeddingModel, localPath: string): ModelArtifact {
  return {
    model,
    localPath,
    files: {
      tokenizerConfig: join(localPath, TOKENIZER_FILE),
      weightsFile: join(localPath, WEIGHTS_FILE),
    },
  };
}

/**
 * Разрешает модель в директорию <cacheDir>/<model>.
 *
 * Существующая директория считается попаданием в кэш без проверки содержимого.
 * При промахе архив скачивается и распаковывается во временную директорию
 * рядом с кэшем, а готовая директория модели переносится на место одним rename,
 * поэтому прерванная загрузка не оставляет частичной директории.
 */
export class ArtifactStore {
  readonly cacheDir: string;
  private readonly showDownloadProgress: boolean;
  private readonly baseUrl: string;
  private readonly downloadTimeoutMs: number;
  private readonly progress: DownloadProgressReporter;

  constructor(options: ArtifactStoreOptions) {
    this.cacheDir = expandHome(options.cacheDir);
    this.showDownloadProgress = options.showDownloadProgress ?? true;
    this.baseUrl = options.baseUrl ?? DEFAULT_MODEL_BASE_URL;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? 0;
    this.progress = options.progress ?? new ConsoleDownloadProgress();
  }

  modelPath(model: EmbeddingModel): string {
    return join(this.cacheDir, model);
  }

  async isCached(model: EmbeddingModel): Promise<boolean> {
    return pathExists(this.modelPath(model));
  }

  async resolve(model: EmbeddingModel): Promise<ModelArtifact> {
    const localPath = this.modelPath(model);

    if (await pathExists(localPath)) {
      return describeArtifact(model, localPath);
    }

    await this.download(model, localPath);
    return describeArtifact(model, localPath);
  }

  // Скачивает и распаковывает архив через staging-директорию.
  private async download(model: EmbeddingModel, localPath: string): Promise<void> {
    let stagingDir: string;
    try {
      await mkdir(this.cacheDir, { recursive: true });
      stagingDir = await mkdtemp(join(this.cacheDir, `.${model}-`));
    } catch (error) {
      throw new FilesystemError(
        `Cannot prepare cache directory ${this.cacheDir}: ${errorMessage(error)}`,
        this.cacheDir,
        { cause: error },
      );
    }

    try {
      const archivePath = join(stagingDir, `${model}.tar.gz`);
      await this.fetchArchive(model, archivePath);

      const extractDir = join(stagingDir, 'extract');
      try {
        await mkdir(extractDir);
        await unpackArchive(archivePath, extractDir);
      } catch (error) {
        throw new ArtifactExtractError(
          `Failed to extract ${model}: ${errorMessage(error)}`,
          { cause: error },
        );
      }

      const extractedModelDir = join(extractDir, model);
      if (!(await pathExists(extractedModelDir))) {
        throw new ArtifactExtractError(`Archive for ${model} does not contain directory "${model}"`);
      }

      await this.promote(extractedModelDir, localPath);
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }

  private async fetchArchive(model: EmbeddingModel, archivePath: string): Promise<void> {
    const url = modelDownloadUrl(model, this.baseUrl);
    const signal = this.downloadTimeoutMs > 0
      ? AbortSignal.timeout(this.downloadTimeoutMs)
      : undefined;

    let response: Response;
    try {
      response = await fetch(url, { signal });
    } catch (error) {
      throw new ArtifactDownloadError(
        `Model download failed: ${errorMessage(error)}`,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new ArtifactDownloadError(
        `Model download failed: ${response.status} ${response.statusText}`,
        response.status,
      );
    }

    if (!response.body) {
      throw new ArtifactDownloadError('Model download failed: empty response body', response.status);
    }

    const source = Readable.fromWeb(response.body);
    const sink = createWriteStream(archivePath);

    try {
      if (this.showDownloadProgress) {
        const totalBytes = parseContentLength(response.headers.get('content-length'));
        this.progress.onStart(model, totalBytes);
        await pipeline(source, new ProgressTracker(this.progress, totalBytes), sink);
      } else {
        await pipeline(source, sink);
      }
    } catch (error) {
      throw new ArtifactDownloadError(
        `Model download failed: ${errorMessage(error)}`,
        response.status,
        { cause: error },
      );
    }
  }

  // Переносит распакованную директорию в кэш.
  private async promote(extractedModelDir: string, localPath: string): Promise<void> {
    try {
      await rename(extractedModelDir, localPath);
    } catch (error) {
      // Параллельный процесс успел положить модель раньше — используем его копию.
      if (await pathExists(localPath)) {
        return;
      }
      throw new FilesystemError(
        `Cannot move model into ${localPath}: ${errorMessage(error)}`,
        localPath,
        { cause: error },
      );
    }
  }
}
