import { access } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { AppConfig, BackendKind } from '../config/schema.js';
import { ConfigError } from '../errors.js';
import { createDb } from '../storage/db.js';
import { MemorySearchBackend } from './memory-backend.js';
import { PostgresSearchBackend } from './postgres-backend.js';
import type { ParserOptions, SearchBackend } from './types.js';

export const BACKEND_KINDS: readonly BackendKind[] = ['memory', 'postgres'];

export function parseBackendKind(value: string): BackendKind {
  const kind = BACKEND_KINDS.find((k) => k === value);
  if (!kind) {
    throw new ConfigError(`Unknown backend "${value}". Available: ${BACKEND_KINDS.join(', ')}`);
  }
  return kind;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Разрешает --index для memory-бэкенда: существующий путь или имя из config.indexes.
 */
export async function resolveIndexPath(
  indexRef: string,
  registry: Record<string, string>,
): Promise<string> {
  const asPath = resolve(indexRef);
  if (await pathExists(asPath)) {
    return asPath;
  }

  const registered = registry[indexRef];
  if (registered === undefined) {
    throw new ConfigError(`Index "${indexRef}" is neither an existing path nor a registered index name`);
  }
  return resolve(registered);
}

// Параметры создания бэкенда.
export interface BackendOptions {
  kind: BackendKind;
  indexRef: string;
  parser: ParserOptions;
  // Ожидаемый параллелизм: размер пула соединений postgres.
  threads: number;
}

// Создание и открытие SearchBackend по конфигурации.
export async function createSearchBackend(
  config: AppConfig,
  options: BackendOptions,
): Promise<SearchBackend> {
  switch (options.kind) {
  case 'memory': {
    const path = await resolveIndexPath(options.indexRef, config.indexes);
    return MemorySearchBackend.open(path, options.parser);
  }
  case 'postgres': {
    const sql = createDb(config.database, Math.max(1, options.threads));
    return PostgresSearchBackend.open(sql, options.indexRef, options.parser);
  }
  default: {
    const unknown: never = options.kind;
    throw new ConfigError(`Unsupported backend: ${String(unknown)}`);
  }
  }
}
