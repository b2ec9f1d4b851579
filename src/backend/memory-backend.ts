// Бэкенд поверх инвертированного индекса в памяти.
import { searchConcurrently } from './batch.js';
import { rankBm25 } from './bm25.js';
import type { Bm25Params } from './bm25.js';
import { loadMemoryIndex } from './memory-index.js';
import type { MemoryIndex } from './memory-index.js';
import { assertAsciiMode, parseQuery } from './parser.js';
import type { Hit, ParserOptions, SearchBackend } from './types.js';

export class MemorySearchBackend implements SearchBackend {
  readonly name = 'memory';

  constructor(
    private readonly index: MemoryIndex,
    private readonly parser: ParserOptions,
    private readonly params?: Bm25Params,
  ) {}

  // Загружает индекс из файла; ошибки загрузки — IndexLoadError, несовпадение ASCII-режима — ConfigError.
  static async open(path: string, parser: ParserOptions): Promise<MemorySearchBackend> {
    const index = await loadMemoryIndex(path);
    assertAsciiMode(path, index.ascii, parser);
    return new MemorySearchBackend(index, parser);
  }

  get documentCount(): number {
    return this.index.docCount;
  }

  async search(text: string, k: number, budget: number): Promise<Hit[]> {
    const query = parseQuery(text, this.parser);
    return rankBm25(this.index, query, k, budget, this.params).hits;
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
    // Индекс живёт в памяти процесса, освобождать нечего.
  }
}
