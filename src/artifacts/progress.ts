// Репортер прогресса загрузки модели.
import { Transform } from 'node:stream';
import type { TransformCallback } from 'node:stream';

// Интерфейс репортера прогресса.
export interface DownloadProgressReporter {
  onStart(label: string, totalBytes: number | null): void;
  onProgress(receivedBytes: number, totalBytes: number | null): void;
  onComplete(receivedBytes: number): void;
}

const BYTES_IN_MB = 1024 * 1024;

// Куда пишется прогресс: stderr или любой поток с write().
export type ProgressOutput = Pick<NodeJS.WritableStream, 'write'>;

function formatMb(bytes: number): string {
  return (bytes / BYTES_IN_MB).toFixed(1);
}

// Вывод прогресса в stderr, не чаще одного раза на процент.
export class ConsoleDownloadProgress implements DownloadProgressReporter {
  private lastPercent = -1;
  private lastReportedMb = -1;

  constructor(private readonly out: ProgressOutput = process.stderr) {}

  onStart(label: string, totalBytes: number | null): void {
    this.lastPercent = -1;
    this.lastReportedMb = -1;
    const size = totalBytes === null ? 'размер неизвестен' : `${formatMb(totalBytes)} МБ`;
    this.out.write(`  Загрузка ${label} (${size})\n`);
  }

  onProgress(receivedBytes: number, totalBytes: number | null): void {
    if (totalBytes === null || totalBytes <= 0) {
      // Без Content-Length — отчитываемся по мегабайтам.
      const mb = Math.floor(receivedBytes / BYTES_IN_MB);
      if (mb > this.lastReportedMb) {
        this.lastReportedMb = mb;
        this.out.write(`\r  Получено: ${formatMb(receivedBytes)} МБ`);
      }
      return;
    }

    const percent = Math.min(100, Math.floor((receivedBytes / totalBytes) * 100));
    if (percent > this.lastPercent) {
      this.lastPercent = percent;
      this.out.write(`\r  ${percent}% (${formatMb(receivedBytes)}/${formatMb(totalBytes)} МБ)`);
    }
  }

  onComplete(receivedBytes: number): void {
    this.out.write(`\n  Загрузка завершена: ${formatMb(receivedBytes)} МБ\n`);
  }
}

/**
 * Прозрачный поток: пропускает байты без изменений и сообщает репортеру,
 * сколько уже получено.
 */
export class ProgressTracker extends Transform {
  private received = 0;

  constructor(
    private readonly reporter: DownloadProgressReporter,
    private readonly totalBytes: number | null,
  ) {
    super();
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.received += chunk.length;
    this.reporter.onProgress(this.received, this.totalBytes);
    callback(null, chunk);
  }

  override _flush(callback: TransformCallback): void {
    this.reporter.onComplete(this.received);
    callback();
  }
}
