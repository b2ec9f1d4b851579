// Операции с таблицей documents.
import type postgres from 'postgres';

// Размер пачки для batch-вставки.
const BATCH_SIZE = 500;

// Документ для вставки.
export interface DocumentInput {
  id: string;
  contents: string;
  // Текст для tsvector: contents после ASCII-фолдинга или как есть.
  searchText: string;
}

// Строка результата полнотекстового поиска.
export interface DocumentScoreRow {
  doc_id: string;
  score: number;
}

// Параметры полнотекстового поиска.
export interface FullTextQuery {
  collection: string;
  text: string;
  limit: number;
  // Сколько совпавших строк максимум оценивать.
  candidateLimit: number;
  // websearch_to_tsquery (операторы, кавычки) вместо plainto_tsquery.
  websearch: boolean;
}

export interface LoadOptions {
  ascii: boolean;
  // Удалить прежние документы коллекции перед загрузкой.
  replace: boolean;
}

export interface LoadResult {
  removed: number;
  inserted: number;
}

// Хранилище документов коллекций.
export class DocumentStorage {
  constructor(private sql: postgres.Sql) {}

  /**
   * Загружает коллекцию в одной транзакции: удаление (при replace), вставка
   * документов и запись ASCII-режима либо применяются целиком, либо не применяются.
   */
  async loadCollection(
    collection: string,
    documents: DocumentInput[],
    options: LoadOptions,
  ): Promise<LoadResult> {
    let result: LoadResult = { removed: 0, inserted: 0 };

    // Type assertion нужен: TransactionSql работает как tagged template в runtime,
    // но TypeScript-типы пакета postgres не отражают это корректно.
    await this.sql.begin(async (tx: unknown) => {
      const storage = new DocumentStorage(tx as postgres.Sql);
      const removed = options.replace ? await storage.deleteCollection(collection) : 0;
      const inserted = await storage.insertBatch(collection, documents);
      await storage.setCollectionMode(collection, options.ascii);
      result = { removed, inserted };
    });

    return result;
  }

  // Вставляет документы пачками; существующие doc_id перезаписываются.
  async insertBatch(collection: string, documents: DocumentInput[]): Promise<number> {
    let inserted = 0;

    for (let i = 0; i < documents.length; i += BATCH_SIZE) {
      const rows = documents.slice(i, i + BATCH_SIZE).map((doc) => ({
        collection,
        doc_id: doc.id,
        contents: doc.contents,
        search_text: doc.searchText,
      }));

      const result = await this.sql`
        INSERT INTO documents ${this.sql(rows, 'collection', 'doc_id', 'contents', 'search_text')}
        ON CONFLICT (collection, doc_id) DO UPDATE
          SET contents = EXCLUDED.contents, search_text = EXCLUDED.search_text
      `;
      inserted += result.count;
    }

    return inserted;
  }

  // Удаляет коллекцию. Возвращает количество удаленных документов.
  async deleteCollection(collection: string): Promise<number> {
    const result = await this.sql`
      DELETE FROM documents WHERE collection = ${collection}
    `;

    return result.count;
  }

  async setCollectionMode(collection: string, ascii: boolean): Promise<void> {
    await this.sql`
      INSERT INTO collections (name, ascii) VALUES (${collection}, ${ascii})
      ON CONFLICT (name) DO UPDATE SET ascii = EXCLUDED.ascii, loaded_at = now()
    `;
  }

  // ASCII-режим коллекции; null, если коллекция загружена не командой index.
  async getCollectionMode(collection: string): Promise<boolean | null> {
    const rows = await this.sql<Array<{ ascii: boolean }>>`
      SELECT ascii FROM collections WHERE name = ${collection}
    `;

    return rows[0]?.ascii ?? null;
  }

  async countByCollection(collection: string): Promise<number> {
    const result = await this.sql<Array<{ count: string }>>`
      SELECT COUNT(*)::text AS count FROM documents WHERE collection = ${collection}
    `;

    return parseInt(result[0]?.count ?? '0', 10);
  }

  // Полнотекстовый поиск по tsvector: кандидаты ограничены candidateLimit, затем ранжирование.
  async searchFullText(query: FullTextQuery): Promise<DocumentScoreRow[]> {
    const tsQuery = query.websearch
      ? this.sql`websearch_to_tsquery('simple', ${query.text})`
      : this.sql`plainto_tsquery('simple', ${query.text})`;

    return await this.sql<DocumentScoreRow[]>`
      WITH q AS (SELECT ${tsQuery} AS query),
      candidates AS (
        SELECT d.doc_id, d.search_vector
        FROM documents d, q
        WHERE d.collection = ${query.collection}
          AND d.search_vector @@ q.query
        LIMIT ${query.candidateLimit}
      )
      SELECT c.doc_id, ts_rank_cd(c.search_vector, q.query)::float8 AS score
      FROM candidates c, q
      ORDER BY score DESC, c.doc_id ASC
      LIMIT ${query.limit}
    `;
  }
}
