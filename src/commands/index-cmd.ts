// Команда topicrun index — построение индекса из JSONL-корпуса.
import { Command } from 'commander';
import { resolve } from 'node:path';
import type postgres from 'postgres';
import { loadConfig } from '../config/index.js';
import type { AppConfig, BackendKind } from '../config/schema.js';
import { buildMemoryIndex, foldAscii, parseBackendKind, writeMemoryIndex } from '../backend/index.js';
import { errorMessage } from '../errors.js';
import { assertUniqueDocumentIds, readCorpus } from '../sources/index.js';
import type { CorpusDocument } from '../sources/index.js';
import { closeDb, createDb, DocumentStorage, runMigrations } from '../storage/index.js';
import type { DocumentInput } from '../storage/index.js';

// Параметры команды index.
export interface IndexOptions {
  corpus: string;
  index: string;
  backend?: string;
  ascii: boolean;
  replace?: boolean;
  config?: string;
}

export interface IndexResult {
  backend: BackendKind;
  // Путь к файлу индекса или имя коллекции.
  target: string;
  files: number;
  documents: number;
}

// Куда писать memory-индекс: путь из config.indexes по имени, иначе аргумент как путь.
export function resolveIndexTarget(indexRef: string, registry: Record<string, string>): string {
  return resolve(registry[indexRef] ?? indexRef);
}

// Строит файл memory-индекса из корпуса.
export async function buildIndexFile(
  config: AppConfig,
  options: IndexOptions,
): Promise<IndexResult> {
  const { files, documents } = await readCorpus(options.corpus);
  const target = resolveIndexTarget(options.index, config.indexes);

  const index = buildMemoryIndex(documents, { ascii: options.ascii });
  await writeMemoryIndex(target, index);

  return { backend: 'memory', target, files: files.length, documents: index.docCount };
}

// Документы для таблицы documents: search_text складывается в том же ASCII-режиме, что и запросы.
export function toDocumentInputs(documents: CorpusDocument[], ascii: boolean): DocumentInput[] {
  return documents.map((doc) => ({
    id: doc.id,
    contents: doc.contents,
    searchText: ascii ? foldAscii(doc.contents) : doc.contents,
  }));
}

/**
 * Загружает корпус в коллекцию: миграции, затем одна транзакция на удаление и вставку.
 * Дубликаты id отклоняются до обращения к БД.
 */
export async function loadCollection(
  sql: postgres.Sql,
  documents: CorpusDocument[],
  options: IndexOptions,
): Promise<number> {
  assertUniqueDocumentIds(documents);

  const applied = await runMigrations(sql);
  if (applied.length > 0) {
    console.log(`  Применены миграции: ${applied.join(', ')}`);
  }

  const storage = new DocumentStorage(sql);
  const { removed, inserted } = await storage.loadCollection(
    options.index,
    toDocumentInputs(documents, options.ascii),
    { ascii: options.ascii, replace: options.replace ?? false },
  );
  if (options.replace) {
    console.log(`  Удалено документов: ${removed}`);
  }

  return inserted;
}

async function loadCorpusIntoDb(config: AppConfig, options: IndexOptions): Promise<IndexResult> {
  const { files, documents } = await readCorpus(options.corpus);
  const sql = createDb(config.database);
  try {
    const inserted = await loadCollection(sql, documents, options);
    return { backend: 'postgres', target: options.index, files: files.length, documents: inserted };
  } finally {
    await closeDb(sql);
  }
}

export const indexCommand = new Command('index')
  .description('Build a search index from a JSONL corpus')
  .requiredOption('--corpus <path>', 'Corpus file or directory of .jsonl files')
  .requiredOption('-i, --index <path-or-name>', 'Index file path, registered index name or postgres collection')
  .option('--backend <name>', 'Search backend: memory | postgres')
  .option('--no-ascii', 'Keep non-ASCII letters in index terms')
  .option('--replace', 'Delete the postgres collection before loading')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: IndexOptions) => {
    try {
      const config = await loadConfig(options.config);
      const backend = options.backend ? parseBackendKind(options.backend) : config.backend;

      console.log(`Индексация корпуса: ${resolve(options.corpus)}`);
      const result = backend === 'postgres'
        ? await loadCorpusIntoDb(config, options)
        : await buildIndexFile(config, options);

      console.log(`  Файлов: ${result.files}, документов: ${result.documents}`);
      console.log(`Индекс готов: ${result.target}`);
    } catch (error) {
      console.error(`Ошибка индексации: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
