// Сборка тестовых архивов моделей.
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import * as tar from 'tar';

// Раскладывает файлы в rootDir и пакует перечисленные верхние директории в .tar.gz.
export async function buildTarball(
  rootDir: string,
  files: Record<string, string>,
  entries: string[],
): Promise<Uint8Array> {
  const contentDir = join(rootDir, 'content');
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(contentDir, relativePath);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  }

  const archivePath = join(rootDir, 'archive.tar.gz');
  await tar.create({ gzip: true, file: archivePath, cwd: contentDir }, entries);
  return new Uint8Array(await readFile(archivePath));
}

export function archiveResponse(body: Uint8Array): Response {
  return new Response(body, {
    status: 200,
    headers: { 'content-length': String(body.byteLength) },
  });
}
