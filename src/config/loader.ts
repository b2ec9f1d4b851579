import { readFile, access } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { ConfigError } from '../errors.js';
import { AppConfigSchema } from './schema.js';
import { defaultConfig } from './defaults.js';
import type { AppConfig } from './schema.js';

// Паттерн для подстановки переменных окружения: ${ENV_VAR}.
const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

// Имя переменной окружения с путём к конфигу.
const CONFIG_ENV_VAR = 'TOPICRUN_CONFIG';

// Имя локального конфиг-файла.
const LOCAL_CONFIG_FILE = 'topicrun.config.yaml';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Рекурсивно заменяет строки вида ${ENV_VAR} на значения из process.env.
 * Неизвестные переменные остаются как есть.
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(ENV_VAR_PATTERN, (match, varName: string) => process.env[varName] ?? match);
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

  return obj;
}

/**
 * Рекурсивный deep-merge: значения source перезаписывают target,
 * вложенные объекты сливаются, массивы заменяются целиком.
 * Исходные объекты не мутируются.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
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
 * 0. Переданный configPath (--config). При отсутствии файла — ConfigError.
 * 1. TOPICRUN_CONFIG. При отсутствии файла — ConfigError.
 * 2. ./topicrun.config.yaml.
 * 3. ~/.config/topicrun/config.yaml.
 */
export async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const resolved = resolve(configPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new ConfigError(`Config file not found at path: ${resolved}`);
  }

  const envConfigPath = process.env[CONFIG_ENV_VAR];
  if (envConfigPath) {
    const resolved = resolve(envConfigPath);
    if (await fileExists(resolved)) {
      return resolved;
    }
    throw new ConfigError(`Config file not found at ${CONFIG_ENV_VAR} path: ${resolved}`);
  }

  const localPath = resolve(LOCAL_CONFIG_FILE);
  if (await fileExists(localPath)) {
    return localPath;
  }

  const globalPath = join(homedir(), '.config', 'topicrun', 'config.yaml');
  if (await fileExists(globalPath)) {
    return globalPath;
  }

  return null;
}

// Валидирует слитый конфиг, ошибки zod превращаются в ConfigError.
export function parseConfig(raw: unknown): AppConfig {
  try {
    return AppConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Загружает конфигурацию:
 * YAML -> подстановка env -> deep merge с дефолтами -> валидация zod.
 * Если конфиг-файл не найден — возвращает дефолтный конфиг.
 */
export async function loadConfig(configPath?: string): Promise<AppConfig> {
  const resolvedPath = await resolveConfigPath(configPath);

  if (!resolvedPath) {
    return parseConfig(defaultConfig);
  }

  const raw = await readFile(resolvedPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in config file: ${resolvedPath}`, { cause: error });
  }

  if (!isPlainObject(parsed)) {
    // Пустой YAML — используем дефолты.
    return parseConfig(defaultConfig);
  }

  const withEnvVars = resolveEnvVars(parsed);
  const merged = isPlainObject(withEnvVars) ? deepMerge(defaultConfig, withEnvVars) : defaultConfig;

  return parseConfig(merged);
}
