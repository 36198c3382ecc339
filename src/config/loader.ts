import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig, AppConfigInput } from './schema.js';

// Паттерн для подстановки переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

// Имя конфиг-файла в текущей директории.
export const CONFIG_FILE_NAME = 'embed.config.yaml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивно обходит объект и заменяет строки вида ${ENV_VAR}
 * на значения из process.env. Если переменная не найдена — оставляет как есть.
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(ENV_VAR_PATTERN, (match, varName: string) => {
      const value = process.env[varName];
      if (value === undefined) {
        return match;
      }
      return value;
    });
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value);
    }
    return result;
  }

  // Числа, boolean, null — возвращаем без изменений.
  return obj;
}

/**
 * Рекурсивный deep-merge двух объектов.
 * Значения из source перезаписывают target, кроме случаев когда оба значения — объекты.
 * Массивы из source полностью заменяют массивы в target (не сливаются).
 * undefined в source не затирает значение target.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Оба значения — объекты, сливаем рекурсивно.
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Определяет путь к конфиг-файлу.
 * Порядок поиска:
 * 0. Переданный configPath (--config). При отсутствии файла — throw Error.
 * 1. EMBED_CONFIG env var. При отсутствии файла — throw Error.
 * 2. ./embed.config.yaml (текущая директория).
 * 3. ~/.config/local-embed/config.yaml (домашняя директория).
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at path: ${resolved}`);
  }

  const envConfigPath = process.env['EMBED_CONFIG'];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new Error(`Config file not found at EMBED_CONFIG path: ${resolved}`);
  }

  const localPath = resolve(CONFIG_FILE_NAME);
  if (await fileExists(localPath)) {
    return localPath;
  }

  const globalPath = join(homedir(), '.config', 'local-embed', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

/**
 * Накладывает частичную конфигурацию поверх готовой и валидирует результат.
 * Используется CLI для флагов вроде --model и --cache-dir.
 */
export function applyOverrides(config: AppConfig, overrides: AppConfigInput): AppConfig {
  return AppConfigSchema.parse(deepMerge(config, overrides));
}

/**
 * Загружает конфигурацию из YAML-файла.
 *
 * 1. Определяет путь к конфиг-файлу (аргумент или поиск).
 * 2. Читает YAML.
 * 3. Подставляет переменные окружения (resolveEnvVars).
 * 4. Deep merge с дефолтами.
 * 5. Валидирует через AppConfigSchema.parse().
 *
 * Если конфиг-файл не найден — возвращает дефолтный конфиг.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);

  if (!resolvedPath) {
    return AppConfigSchema.parse(defaultConfig);
  }

  const raw = await readFile(resolvedPath, 'utf-8');
  const parsed: unknown = parseYaml(raw);

  if (!isPlainObject(parsed)) {
    // Пустой или невалидный YAML — используем дефолты.
    return AppConfigSchema.parse(defaultConfig);
  }

  const withEnvVars = resolveEnvVars(parsed);
  const merged = isPlainObject(withEnvVars)
    ? deepMerge(defaultConfig, withEnvVars)
    : defaultConfig;

  return AppConfigSchema.parse(merged);
}
