// Barrel-файл модуля поисковых бэкендов.
export type { Hit, ParserOptions, SearchBackend } from './types.js';
export type { ParsedQuery } from './parser.js';
export { parseQuery, tokenize, analyzeText, foldAscii, normalizeQueryText } from './parser.js';
export { selectTopK, compareHits } from './top-k.js';
export type { MemoryIndexFile, Posting, PostingsList } from './memory-index.js';
export { MemoryIndex, MemoryIndexFileSchema, loadMemoryIndex, writeMemoryIndex } from './memory-index.js';
export type { Bm25Params, RankResult } from './bm25.js';
export { rankBm25, idf, DEFAULT_BM25 } from './bm25.js';
export { buildMemoryIndex } from './index-builder.js';
export { searchConcurrently } from './batch.js';
export { MemorySearchBackend } from './memory-backend.js';
export { PostgresSearchBackend } from './postgres-backend.js';
export type { BackendOptions } from './factory.js';
export { BACKEND_KINDS, createSearchBackend, parseBackendKind, resolveIndexPath } from './factory.js';
