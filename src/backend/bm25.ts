// BM25 с бюджетом на количество обработанных постингов.
import type { MemoryIndex, PostingsList } from './memory-index.js';
import type { ParsedQuery } from './parser.js';
import { compareHits, selectTopK } from './top-k.js';
import type { Hit } from './types.js';

export interface Bm25Params {
  k1: number;
  b: number;
}

export const DEFAULT_BM25: Bm25Params = { k1: 0.9, b: 0.4 };

// Результат ранжирования с учётом израсходованного бюджета.
export interface RankResult {
  hits: Hit[];
  postingsProcessed: number;
  truncated: boolean;
}

export function idf(docCount: number, df: number): number {
  return Math.log(1 + (docCount - df + 0.5) / (df + 0.5));
}

function docIdSet(list: PostingsList | undefined): Set<string> {
  return new Set(list?.postings.map((p) => p.docId) ?? []);
}

/**
 * Ранжирует документы по запросу.
 *
 * Термины обрабатываются от редких к частым; каждый оценённый постинг
 * стоит одну единицу бюджета. Когда бюджет исчерпан, оценка прекращается,
 * уже накопленные суммы ранжируются как есть.
 * Обязательные (+) и исключённые (-) термины фильтруют кандидатов.
 */
export function rankBm25(
  index: MemoryIndex,
  query: ParsedQuery,
  k: number,
  budget: number,
  params: Bm25Params = DEFAULT_BM25,
): RankResult {
  if (k <= 0 || index.docCount === 0) {
    return { hits: [], postingsProcessed: 0, truncated: false };
  }

  const mustSets = query.must.map((term) => docIdSet(index.getPostings(term)));
  // Обязательный термин без постингов — пустой результат.
  if (mustSets.some((set) => set.size === 0)) {
    return { hits: [], postingsProcessed: 0, truncated: false };
  }
  const excluded = new Set<string>();
  for (const term of query.mustNot) {
    for (const docId of docIdSet(index.getPostings(term))) excluded.add(docId);
  }

  const lists = [...new Set([...query.must, ...query.should])]
    .map((term) => index.getPostings(term))
    .filter((list): list is PostingsList => list !== undefined && list.df > 0)
    .sort((a, b) => a.df - b.df || (a.term < b.term ? -1 : 1));

  const scores = new Map<string, number>();
  const avgDocLength = index.avgDocLength > 0 ? index.avgDocLength : 1;
  let processed = 0;
  let truncated = false;

  scoring:
  for (const list of lists) {
    const termIdf = idf(index.docCount, list.df);
    for (const posting of list.postings) {
      if (processed >= budget) {
        truncated = true;
        break scoring;
      }
      processed++;

      const norm = params.k1 * (1 - params.b + params.b * (index.docLength(posting.docId) / avgDocLength));
      const termScore = termIdf * (posting.tf * (params.k1 + 1)) / (posting.tf + norm);
      scores.set(posting.docId, (scores.get(posting.docId) ?? 0) + termScore);
    }
  }

  const candidates: Hit[] = [];
  for (const [docId, score] of scores) {
    if (excluded.has(docId)) continue;
    if (!mustSets.every((set) => set.has(docId))) continue;
    candidates.push({ docId, score });
  }

  return {
    hits: selectTopK(candidates, k, compareHits),
    postingsProcessed: processed,
    truncated,
  };
}
