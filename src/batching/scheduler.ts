// Разбиение входа на батчи и их параллельная обработка с сохранением порядка.
import { TensorShapeError } from '../errors.js';

export const DEFAULT_BATCH_SIZE = 512;

// Диапазон [startIndex, endIndex) исходного списка.
export interface BatchJob {
  startIndex: number;
  endIndex: number;
  inputs: readonly string[];
}

// Обработка одного батча: ровно один результат на каждый вход.
export type ChunkProcessor<T> = (inputs: readonly string[]) => Promise<T[]>;

export interface BatchSchedulerOptions {
  // Максимум батчей в работе. 0 или undefined — без ограничения.
  maxConcurrency?: number;
  // После первой ошибки не брать новые батчи.
  failFast?: boolean;
}

// Не задан или не положителен — 512. Infinity даёт один батч на весь вход.
export function resolveBatchSize(chunkSize: number | undefined): number {
  if (chunkSize === undefined || Number.isNaN(chunkSize) || chunkSize < 1) {
    return DEFAULT_BATCH_SIZE;
  }
  return Math.floor(chunkSize);
}

// Непрерывные батчи размера chunkSize; последний может быть короче.
export function partition(inputs: readonly string[], chunkSize?: number): BatchJob[] {
  const size = resolveBatchSize(chunkSize);
  const jobs: BatchJob[] = [];
  for (let start = 0; start < inputs.length; start += size) {
    const end = Math.min(start + size, inputs.length);
    jobs.push({ startIndex: start, endIndex: end, inputs: inputs.slice(start, end) });
  }
  return jobs;
}

/**
 * Пул воркеров над батчами.
 *
 * Результаты пишутся в заранее выделенный массив: каждый батч владеет только своим
 * диапазоном индексов, поэтому порядок не зависит от порядка завершения.
 * Ошибки копятся в порядке возникновения; после завершения всех запущенных батчей
 * выбрасывается первая из них, частичные результаты отбрасываются.
 */
export class BatchScheduler<T> {
  private readonly maxConcurrency: number;
  private readonly failFast: boolean;

  constructor(
    private readonly processor: ChunkProcessor<T>,
    options: BatchSchedulerOptions = {},
  ) {
    this.maxConcurrency = options.maxConcurrency ?? 0;
    this.failFast = options.failFast ?? false;
  }

  async runAll(inputs: readonly string[], chunkSize?: number): Promise<T[]> {
    const jobs = partition(inputs, chunkSize);
    if (jobs.length === 0) {
      return [];
    }

    const results = new Array<T>(inputs.length);
    const errors: unknown[] = [];
    const workerCount = this.maxConcurrency > 0
      ? Math.min(this.maxConcurrency, jobs.length)
      : jobs.length;

    let next = 0;
    const takeJob = (): BatchJob | undefined => {
      if (this.failFast && errors.length > 0) {
        return undefined;
      }
      return jobs[next++];
    };

    const worker = async (): Promise<void> => {
      for (let job = takeJob(); job !== undefined; job = takeJob()) {
        const { startIndex, inputs: chunk } = job;
        try {
          const output = await this.processor(chunk);
          if (output.length !== chunk.length) {
            throw new TensorShapeError(
              `Batch produced ${output.length} results for ${chunk.length} inputs`,
            );
          }
          output.forEach((item, offset) => {
            results[startIndex + offset] = item;
          });
        } catch (error) {
          errors.push(error);
        }
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (errors.length > 0) {
      throw errors[0];
    }
    return results;
  }
}
