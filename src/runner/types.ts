// Типы оркестратора прогона.
import type { Hit } from '../backend/types.js';
import type { Topic } from '../topics/types.js';

// Источник топиков: однопроходная упорядоченная последовательность с известным размером.
export interface TopicSource extends Iterable<Topic> {
  readonly count: number;
}

// Параметры прогона, неизменные на всё время выполнения.
export interface RunConfig {
  readonly hits: number;
  readonly budget: number;
  readonly batchSize: number;
  readonly threads: number;
}

// Единица обмена между оркестратором и sink.
export interface ResultPair {
  topicId: string;
  hits: Hit[];
}

// Исход одного обращения к бэкенду: результаты либо ошибка для всего шага.
export type StepOutcome =
  | { ok: true; pairs: ResultPair[] }
  | { ok: false; topicIds: string[]; error: unknown };

// Итог прогона.
export interface RunSummary {
  topics: number;
  batches: number;
  durationMs: number;
}

// Наблюдатель прогона; onTopic вызывается ровно один раз на каждый прочитанный топик.
export interface RunObserver {
  onTopic(current: number, total: number, topicId: string): void;
  onBatch(size: number): void;
  onComplete(summary: RunSummary): void;
}
