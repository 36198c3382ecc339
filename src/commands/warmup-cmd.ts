// Команда local-embed warmup — загрузка модели в кэш.
import { Command } from 'commander';
import { ArtifactStore } from '../artifacts/index.js';
import { resolveCommandConfig } from './options.js';
import type { ConfigOptions } from './options.js';

export const warmupCommand = new Command('warmup')
  .description('Download the model into the local cache')
  .option('-c, --config <path>', 'Path to config file')
  .option('-m, --model <name>', 'Model name')
  .option('--cache-dir <dir>', 'Cache directory')
  .action(async (options: ConfigOptions) => {
    try {
      const config = await resolveCommandConfig(options);
      const store = new ArtifactStore({
        cacheDir: config.cache.dir,
        showDownloadProgress: config.cache.showDownloadProgress,
        baseUrl: config.cache.baseUrl,
        downloadTimeoutMs: config.cache.downloadTimeoutMs,
      });

      const model = config.model.name;
      if (await store.isCached(model)) {
        console.log(`Модель ${model} уже в кэше.`);
      } else {
        console.log(`Загрузка модели ${model}...`);
      }

      const artifact = await store.resolve(model);
      console.log(`Путь: ${artifact.localPath}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка загрузки: ${message}`);
      process.exit(1);
    }
  });
