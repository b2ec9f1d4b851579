// Типы модуля поисковых бэкендов.

// Один результат ранжирования.
export interface Hit {
  docId: string;
  score: number;
}

// Режимы парсера запросов.
export interface ParserOptions {
  ascii: boolean;
  query: boolean;
}

/**
 * Поисковый бэкенд.
 *
 * - `search` возвращает не более `k` результатов, `budget` ограничивает внутреннюю
 *   работу и при исчерпании молча усекает поиск.
 * - `batchSearch` выполняет те же запросы с параллелизмом до `threads` и возвращает
 *   по одной записи на каждый id; порядок записей в Map не гарантируется.
 */
export interface SearchBackend {
  readonly name: string;

  search(text: string, k: number, budget: number): Promise<Hit[]>;

  batchSearch(
    texts: string[],
    ids: string[],
    k: number,
    budget: number,
    threads: number,
  ): Promise<Map<string, Hit[]>>;

  close(): Promise<void>;
}
