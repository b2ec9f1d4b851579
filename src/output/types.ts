// Типы модуля вывода результатов.
import type { Hit } from '../backend/types.js';
import type { OutputFormat } from '../config/schema.js';
import type { TopicSet } from '../topics/types.js';

export type { OutputFormat };

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['trec', 'msmarco', 'kilt'];

// Получатель результатов: одна запись на топик, вызовы строго последовательные.
export interface ResultSink {
  write(topicId: string, hits: readonly Hit[]): Promise<void>;
}

export interface OutputWriterOptions {
  // Максимум записей на топик.
  maxHits: number;
  // Тег прогона (последняя колонка TREC).
  tag: string;
  // Набор топиков: KILT повторяет текст запроса.
  topics?: TopicSet;
}

// Результат с рангом, подготовленный к сериализации.
export interface RankedHit extends Hit {
  rank: number;
}
