// Чтение набора топиков по пути или зарегистрированному имени.
import { readFile, stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { ConfigError } from '../errors.js';
import {
  assertUniqueIds,
  parseJsonlTopics,
  parseKiltTopics,
  parseTrecTopics,
  parseTsvTopics,
} from './parsers.js';
import { TOPICS_FORMATS, TopicSet } from './types.js';
import type { Topic, TopicsFormat } from './types.js';

// Разрешённый источник топиков.
export interface ResolvedTopics {
  name: string;
  path: string;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export function parseTopicsFormat(value: string): TopicsFormat {
  const format = TOPICS_FORMATS.find((f) => f === value);
  if (!format) {
    throw new ConfigError(`Unknown topics format "${value}". Available: ${TOPICS_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Разрешает аргумент --topics.
 * Существующий файл имеет приоритет; имя набора — базовое имя файла без расширения.
 * Иначе ищем имя в реестре config.topics.
 */
export async function resolveTopics(
  source: string,
  registry: Record<string, string>,
): Promise<ResolvedTopics> {
  const asPath = resolve(source);
  if (await isFile(asPath)) {
    return { name: basename(asPath, extname(asPath)), path: asPath };
  }

  const registered = registry[source];
  if (registered !== undefined) {
    return { name: source, path: resolve(registered) };
  }

  const known = Object.keys(registry);
  throw new ConfigError(
    `Unknown topics "${source}": not a file and not registered` +
    (known.length > 0 ? ` (registered: ${known.join(', ')})` : ''),
  );
}

// Выбирает парсер default-формата по расширению файла.
function parseDefault(path: string, content: string): Topic[] {
  const ext = extname(path).toLowerCase();
  switch (ext) {
  case '.tsv':
  case '.txt':
    return parseTsvTopics(content);
  case '.jsonl':
  case '.json':
    return parseJsonlTopics(content);
  case '.trec':
  case '.xml':
  case '.topics':
    return parseTrecTopics(content);
  default:
    throw new ConfigError(`Cannot infer topics layout from extension "${ext}" (${path})`);
  }
}

// Читает и парсит файл топиков, проверяя уникальность id.
export async function readTopicsFile(
  name: string,
  path: string,
  format: TopicsFormat,
): Promise<TopicSet> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read topics file: ${path}`, { cause: error });
  }

  let topics: Topic[];
  try {
    topics = format === 'kilt' ? parseKiltTopics(content) : parseDefault(path, content);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw new ConfigError(`${path}: ${error.message}`, { cause: error });
    }
    throw error;
  }

  assertUniqueIds(topics);
  return new TopicSet(name, topics);
}

// Полный путь: аргумент --topics -> TopicSet.
export async function readTopics(
  source: string,
  format: TopicsFormat,
  registry: Record<string, string> = {},
): Promise<TopicSet> {
  const { name, path } = await resolveTopics(source, registry);
  return readTopicsFile(name, path, format);
}
