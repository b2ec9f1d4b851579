// Оркестрация прогона: топики -> бэкенд (поштучно или батчами) -> sink в исходном порядке.
import type { SearchBackend } from '../backend/types.js';
import { ConfigError, SearchRunError } from '../errors.js';
import type { ResultSink } from '../output/types.js';
import type { Topic } from '../topics/types.js';
import { NoopRunObserver } from './progress.js';
import { reprojectBatch } from './reproject.js';
import type { RunConfig, RunObserver, RunSummary, StepOutcome, TopicSource } from './types.js';

// Накопитель батча: id и тексты в порядке поступления.
class BatchAccumulator {
  readonly ids: string[] = [];
  readonly texts: string[] = [];

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.ids.length;
  }

  get isFull(): boolean {
    return this.ids.length >= this.capacity;
  }

  add(topic: Topic): void {
    this.ids.push(topic.id);
    this.texts.push(topic.text);
  }

  clear(): void {
    this.ids.length = 0;
    this.texts.length = 0;
  }
}

function assertInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

// Проверяет предусловия прогона до чтения первого топика.
export function validateRunConfig(config: RunConfig): void {
  assertInteger('batchSize', config.batchSize, 1);
  assertInteger('threads', config.threads, 1);
  assertInteger('hits', config.hits, 0);
  assertInteger('budget', config.budget, 1);
}

// Поштучный режим: без батчей и без параллелизма.
export function isSingleMode(config: RunConfig): boolean {
  return config.batchSize <= 1 && config.threads <= 1;
}

export async function executeSingle(
  backend: SearchBackend,
  topic: Topic,
  config: RunConfig,
): Promise<StepOutcome> {
  try {
    const hits = await backend.search(topic.text, config.hits, config.budget);
    return { ok: true, pairs: [{ topicId: topic.id, hits }] };
  } catch (error) {
    return { ok: false, topicIds: [topic.id], error };
  }
}

export async function executeBatch(
  backend: SearchBackend,
  ids: readonly string[],
  texts: readonly string[],
  config: RunConfig,
): Promise<StepOutcome> {
  try {
    const results = await backend.batchSearch(
      [...texts],
      [...ids],
      config.hits,
      config.budget,
      config.threads,
    );
    return { ok: true, pairs: reprojectBatch(ids, results) };
  } catch (error) {
    return { ok: false, topicIds: [...ids], error };
  }
}

/**
 * Выполняет все топики ровно один раз и передаёт результаты в sink в порядке поступления.
 *
 * Поштучный режим (batchSize <= 1 и threads <= 1): search на каждый топик.
 * Батч-режим: топики копятся до batchSize; батч закрывается, когда заполнен
 * или когда добавлен последний топик источника, поэтому неполный хвост тоже выполняется.
 *
 * Любая ошибка бэкенда прерывает весь прогон через SearchRunError: результаты
 * предыдущих шагов уже в sink, из упавшего шага не пишется ничего.
 * Ошибки sink пробрасываются как есть.
 */
export async function runTopics(
  topics: TopicSource,
  config: RunConfig,
  backend: SearchBackend,
  sink: ResultSink,
  observer: RunObserver = new NoopRunObserver(),
): Promise<RunSummary> {
  validateRunConfig(config);

  const startTime = Date.now();
  const total = topics.count;
  const single = isSingleMode(config);
  const batch = new BatchAccumulator(config.batchSize);
  let dispatched = 0;
  let calls = 0;

  const dispatch = async (outcome: StepOutcome, size: number): Promise<void> => {
    calls++;
    observer.onBatch(size);
    if (!outcome.ok) {
      throw new SearchRunError(outcome.topicIds, dispatched, outcome.error);
    }
    for (const pair of outcome.pairs) {
      await sink.write(pair.topicId, pair.hits);
      dispatched++;
    }
  };

  let index = 0;
  for (const topic of topics) {
    observer.onTopic(index + 1, total, topic.id);

    if (single) {
      await dispatch(await executeSingle(backend, topic, config), 1);
    } else {
      batch.add(topic);
      if (batch.isFull || index === total - 1) {
        await dispatch(await executeBatch(backend, batch.ids, batch.texts, config), batch.size);
        batch.clear();
      }
    }

    index++;
  }

  // Источник оказался короче заявленного count: хвост всё равно выполняется.
  if (batch.size > 0) {
    await dispatch(await executeBatch(backend, batch.ids, batch.texts, config), batch.size);
    batch.clear();
  }

  const summary: RunSummary = {
    topics: dispatched,
    batches: calls,
    durationMs: Date.now() - startTime,
  };
  observer.onComplete(summary);
  return summary;
}
