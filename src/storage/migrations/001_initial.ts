// Начальная миграция: коллекции и таблица documents с полнотекстовым индексом.
import type { Migration } from '../migrator.js';

const migration: Migration = {
  name: '001_initial',

  async up(sql) {
    // Режим анализатора, которым загружена коллекция.
    await sql`
      CREATE TABLE collections (
        name       TEXT PRIMARY KEY,
        ascii      BOOLEAN NOT NULL,
        loaded_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;

    // search_text — contents после ASCII-фолдинга (или как есть); из него строится search_vector.
    await sql`
      CREATE TABLE documents (
        collection    TEXT NOT NULL,
        doc_id        TEXT NOT NULL,
        contents      TEXT NOT NULL,
        search_text   TEXT NOT NULL,
        search_vector tsvector
          GENERATED ALWAYS AS (to_tsvector('simple', search_text)) STORED,
        created_at    TIMESTAMPTZ NOT NULL DEFAULT now(),
        PRIMARY KEY (collection, doc_id)
      )
    `;

    await sql`CREATE INDEX idx_documents_fts ON documents USING GIN (search_vector)`;
  },
};

export default migration;
