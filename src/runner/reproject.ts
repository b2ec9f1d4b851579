import { BatchResultMissingError } from '../errors.js';
import type { Hit } from '../backend/types.js';
import type { ResultPair } from './types.js';

/**
 * Переупорядочивает результаты батча в порядок вставки id.
 * Порядок ключей Map, возвращённой бэкендом, не используется.
 */
export function reprojectBatch(ids: readonly string[], results: ReadonlyMap<string, Hit[]>): ResultPair[] {
  return ids.map((topicId) => {
    const hits = results.get(topicId);
    if (hits === undefined) {
      throw new BatchResultMissingError(topicId);
    }
    return { topicId, hits };
  });
}
