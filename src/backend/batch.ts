// Общая логика batchSearch: ограниченный параллелизм и сбор результатов по id.
import pLimit from 'p-limit';
import type { Hit } from './types.js';

// Выполняет searchOne для каждой пары (id, text) не более чем в `threads` потоков.
export async function searchConcurrently(
  texts: string[],
  ids: string[],
  threads: number,
  searchOne: (text: string) => Promise<Hit[]>,
): Promise<Map<string, Hit[]>> {
  if (texts.length !== ids.length) {
    throw new Error(`batchSearch expects as many ids as queries (${ids.length} ids, ${texts.length} queries)`);
  }

  const limit = pLimit(Math.max(1, Math.floor(threads)));
  const results = new Map<string, Hit[]>();

  await Promise.all(
    ids.map((id, i) =>
      limit(async () => {
        results.set(id, await searchOne(texts[i] ?? ''));
      }),
    ),
  );

  return results;
}
