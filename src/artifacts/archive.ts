// Распаковка .tar.gz архивов моделей.
import type { Stats } from 'node:fs';
import * as tar from 'tar';
import type { ReadEntry } from 'tar';

// Типы записей, которые пишутся на диск. Остальные (ссылки, устройства, FIFO) пропускаются.
const EXTRACTED_ENTRY_TYPES: ReadonlySet<string> = new Set(['Directory', 'File', 'OldFile']);

export function isExtractableEntry(entry: Stats | ReadEntry): boolean {
  if (!('type' in entry)) {
    return true;
  }
  return EXTRACTED_ENTRY_TYPES.has(entry.type);
}

// Распаковывает архив в целевую директорию, сохраняя относительные пути.
// gzip определяется по сигнатуре файла.
export async function unpackArchive(
  archivePath: string,
  targetDir: string,
): Promise<void> {
  await tar.extract({
    file: archivePath,
    cwd: targetDir,
    // Предупреждения (битые заголовки, ошибки записи) становятся ошибками.
    strict: true,
    filter: (_path, entry) => isExtractableEntry(entry),
  });
}
