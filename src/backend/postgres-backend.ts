// Бэкенд полнотекстового поиска PostgreSQL по коллекции таблицы documents.
import type postgres from 'postgres';
import { errorMessage, IndexLoadError } from '../errors.js';
import { closeDb } from '../storage/db.js';
import { DocumentStorage } from '../storage/documents.js';
import { searchConcurrently } from './batch.js';
import { assertAsciiMode, normalizeQueryText } from './parser.js';
import type { Hit, ParserOptions, SearchBackend } from './types.js';

export class PostgresSearchBackend implements SearchBackend {
  readonly name = 'postgres';

  constructor(
    private readonly storage: DocumentStorage,
    private readonly collection: string,
    private readonly parser: ParserOptions,
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  /**
   * Проверяет, что коллекция существует и не пуста и загружена в том же ASCII-режиме.
   * Недоступная БД или пустая коллекция — IndexLoadError, другой режим — ConfigError;
   * соединение при этом закрывается.
   */
  static async open(
    sql: postgres.Sql,
    collection: string,
    parser: ParserOptions,
  ): Promise<PostgresSearchBackend> {
    const storage = new DocumentStorage(sql);

    let count: number;
    let ascii: boolean | null;
    try {
      count = await storage.countByCollection(collection);
      ascii = await storage.getCollectionMode(collection);
    } catch (error) {
      await closeDb(sql);
      throw new IndexLoadError(`Cannot open collection "${collection}": ${errorMessage(error)}`, { cause: error });
    }

    if (count === 0) {
      await closeDb(sql);
      throw new IndexLoadError(`Collection "${collection}" has no documents`);
    }

    if (ascii !== null) {
      try {
        assertAsciiMode(`"${collection}"`, ascii, parser);
      } catch (error) {
        await closeDb(sql);
        throw error;
      }
    }

    return new PostgresSearchBackend(storage, collection, parser, () => closeDb(sql));
  }

  async search(text: string, k: number, budget: number): Promise<Hit[]> {
    if (k <= 0) {
      return [];
    }

    const rows = await this.storage.searchFullText({
      collection: this.collection,
      text: normalizeQueryText(text, this.parser),
      limit: k,
      candidateLimit: budget,
      websearch: this.parser.query,
    });

    return rows.map((row) => ({ docId: row.doc_id, score: Number(row.score) }));
  }

  async batchSearch(
    texts: string[],
    ids: string[],
    k: number,
    budget: number,
    threads: number,
  ): Promise<Map<string, Hit[]>> {
    return searchConcurrently(texts, ids, threads, (text) => this.search(text, k, budget));
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
