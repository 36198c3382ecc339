// Команда local-embed embed — эмбеддинги текстов в JSON.
import { Command, InvalidArgumentError, Option } from 'commander';
import { createEmbeddingService } from '../embeddings/index.js';
import type { EmbeddingService, EmbeddingVector } from '../embeddings/index.js';
import { resolveCommandConfig } from './options.js';
import type { ConfigOptions } from './options.js';

export const EMBED_MODES = ['plain', 'query', 'passage'] as const;
export type EmbedMode = (typeof EMBED_MODES)[number];

interface EmbedOptions extends ConfigOptions {
  mode: EmbedMode;
  batchSize?: number;
}

function parseBatchSize(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Batch size must be a positive integer.');
  }
  return parsed;
}

// Выбор операции сервиса по режиму.
export async function embedTexts(
  service: EmbeddingService,
  texts: readonly string[],
  mode: EmbedMode,
  batchSize?: number,
): Promise<EmbeddingVector[]> {
  switch (mode) {
  case 'query': {
    // Запросы идут по одному, чтобы не открывать сессию на каждый текст разом.
    const vectors: EmbeddingVector[] = [];
    for (const text of texts) {
      vectors.push(await service.queryEmbed(text));
    }
    return vectors;
  }
  case 'passage':
    return service.passageEmbed(texts, batchSize);
  case 'plain':
    return service.embed(texts, batchSize);
  }
}

export const embedCommand = new Command('embed')
  .description('Embed texts and print vectors as JSON')
  .argument('<texts...>', 'Texts to embed')
  .option('-c, --config <path>', 'Path to config file')
  .option('-m, --model <name>', 'Model name')
  .option('--cache-dir <dir>', 'Cache directory')
  .addOption(
    new Option('--mode <mode>', 'Input kind')
      .choices(EMBED_MODES)
      .default('plain'),
  )
  .option('-b, --batch-size <n>', 'Inputs per batch', parseBatchSize)
  .action(async (texts: string[], options: EmbedOptions) => {
    try {
      const config = await resolveCommandConfig(options);
      const service = await createEmbeddingService(config);

      try {
        const vectors = await embedTexts(service, texts, options.mode, options.batchSize);
        console.log(JSON.stringify(vectors));
      } finally {
        service.destroy();
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
