// Общие опции команд, влияющие на конфигурацию.
import { applyOverrides, loadConfig } from '../config/index.js';
import type { AppConfig } from '../config/index.js';
import { isEmbeddingModel, MODEL_NAMES } from '../models/registry.js';
import type { EmbeddingModel } from '../models/registry.js';

export interface ConfigOptions {
  config?: string;
  model?: string;
  cacheDir?: string;
}

export function parseModelOption(value: string | undefined): EmbeddingModel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isEmbeddingModel(value)) {
    throw new Error(`Unknown model "${value}". Supported: ${MODEL_NAMES.join(', ')}`);
  }
  return value;
}

// Загружает конфиг и накладывает флаги --model и --cache-dir.
export async function resolveCommandConfig(options: ConfigOptions): Promise<AppConfig> {
  const config = await loadConfig(options.config);

  return applyOverrides(config, {
    model: { name: parseModelOption(options.model) },
    cache: { dir: options.cacheDir },
  });
}
