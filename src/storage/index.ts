// Barrel-файл модуля хранения.
export { createDb, closeDb } from './db.js';

export type { Migration } from './migrator.js';
export { migrations, runMigrations, getAppliedMigrations } from './migrator.js';

export type { DocumentInput, DocumentScoreRow, FullTextQuery, LoadOptions, LoadResult } from './documents.js';
export { DocumentStorage } from './documents.js';
