// Команда local-embed models — список поддерживаемых моделей.
import { Command } from 'commander';
import { DEFAULT_MODEL, SUPPORTED_MODELS } from '../models/registry.js';

export const modelsCommand = new Command('models')
  .description('List supported embedding models')
  .action(() => {
    const COL_NAME = 26;
    const COL_DIM = 12;

    const header =
      'Модель'.padEnd(COL_NAME) + ' ' +
      'Размерность'.padEnd(COL_DIM) + ' ' +
      'Описание';

    console.log('');
    console.log(header);
    console.log('-'.repeat(header.length + 20));

    for (const description of Object.values(SUPPORTED_MODELS)) {
      const marker = description.model === DEFAULT_MODEL ? ' (по умолчанию)' : '';
      console.log(
        `${description.model.padEnd(COL_NAME)} ${String(description.dimensions).padEnd(COL_DIM)} ` +
        `${description.description}${marker}`,
      );
    }
  });
