import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { isSingleMode, runTopics } from '../orchestrator.js';
import type { RunConfig, RunObserver, TopicSource } from '../types.js';
import { BatchResultMissingError, ConfigError, SearchRunError } from '../../errors.js';
import { TrecWriter } from '../../output/formats.js';
import { withOutputWriter } from '../../output/writer.js';
import { FakeBackend, RecordingSink, fakeHits, makeTopics } from './fakes.js';

const N = 5;

function config(overrides: Partial<RunConfig> = {}): RunConfig {
  return { hits: 10, budget: 1000, batchSize: 1, threads: 1, ...overrides };
}

describe('runTopics', () => {
  it.each([1, 2, N, N + 1])('batchSize=%i: ровно одна запись на каждый топик в исходном порядке', async (batchSize) => {
    const backend = new FakeBackend();
    const sink = new RecordingSink();

    const summary = await runTopics(makeTopics(N), config({ batchSize }), backend, sink);

    expect(sink.topicIds).toEqual(['1', '2', '3', '4', '5']);
    expect(summary.topics).toBe(N);
  });

  it('сохраняет порядок топиков, хотя бэкенд возвращает Map в обратном порядке', async () => {
    const backend = new FakeBackend();
    const sink = new RecordingSink();

    await runTopics(makeTopics(N), config({ batchSize: 3 }), backend, sink);

    expect(sink.topicIds).toEqual(['1', '2', '3', '4', '5']);
    expect(sink.records[3]).toEqual({ topicId: '4', hits: fakeHits('q4', 10) });
  });

  it('N=5, b=3: батчи размером 3 и 2, хвост не теряется', async () => {
    const backend = new FakeBackend();

    const summary = await runTopics(makeTopics(5), config({ batchSize: 3 }), backend, new RecordingSink());

    expect(backend.batchCalls.map((c) => c.ids)).toEqual([['1', '2', '3'], ['4', '5']]);
    expect(backend.searchCalls).toEqual([]);
    expect(summary.batches).toBe(2);
  });

  it('поштучный режим вызывает search на каждый топик', async () => {
    const backend = new FakeBackend();

    const summary = await runTopics(makeTopics(3), config(), backend, new RecordingSink());

    expect(backend.searchCalls).toEqual(['q1', 'q2', 'q3']);
    expect(backend.batchCalls).toEqual([]);
    expect(summary.batches).toBe(3);
  });

  it('threads > 1 при batchSize = 1 включает батч-режим с батчами по одному', async () => {
    const backend = new FakeBackend();

    await runTopics(makeTopics(3), config({ threads: 4 }), backend, new RecordingSink());

    expect(backend.batchCalls).toEqual([
      { ids: ['1'], threads: 4 },
      { ids: ['2'], threads: 4 },
      { ids: ['3'], threads: 4 },
    ]);
  });

  it('hits=3 ограничивает каждый список результатов', async () => {
    const sink = new RecordingSink();

    await runTopics(makeTopics(N), config({ hits: 3, batchSize: 2 }), new FakeBackend(), sink);

    expect(sink.records.map((r) => r.hits.length)).toEqual([3, 3, 3, 3, 3]);
  });

  it('пустой источник: ноль записей и ноль вызовов бэкенда', async () => {
    const backend = new FakeBackend();
    const sink = new RecordingSink();

    const summary = await runTopics(makeTopics(0), config({ batchSize: 4 }), backend, sink);

    expect(sink.records).toEqual([]);
    expect(backend.batchCalls).toEqual([]);
    expect(summary).toMatchObject({ topics: 0, batches: 0 });
  });

  it('ошибка на 2-м из 5 запросов в поштучном режиме: записан только 1-й, дальше не идём', async () => {
    const backend = new FakeBackend({ failOnText: 'q2' });
    const sink = new RecordingSink();

    const run = runTopics(makeTopics(5), config(), backend, sink);

    await expect(run).rejects.toBeInstanceOf(SearchRunError);
    await expect(run).rejects.toMatchObject({ topicIds: ['2'], dispatched: 1 });
    expect(sink.topicIds).toEqual(['1']);
    expect(backend.searchCalls).toEqual(['q1', 'q2']);
  });

  it('ошибка 2-го батча: записан только первый батч, ошибка называет id упавшего', async () => {
    const backend = new FakeBackend({ failOnBatch: 2 });
    const sink = new RecordingSink();

    const error = await runTopics(makeTopics(5), config({ batchSize: 2 }), backend, sink).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchRunError);
    expect(error).toMatchObject({ topicIds: ['3', '4'], dispatched: 2 });
    expect((error as Error).message).toBe(
      'Search failed for topic(s) 3, 4 after 2 result(s) written: batch failed',
    );
    expect(sink.topicIds).toEqual(['1', '2']);
    expect(backend.batchCalls).toHaveLength(2);
  });

  it('неполный ответ батча прерывает прогон с BatchResultMissingError в cause', async () => {
    const backend = new FakeBackend({ dropId: '2' });
    const sink = new RecordingSink();

    const error = await runTopics(makeTopics(3), config({ batchSize: 3 }), backend, sink).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SearchRunError);
    expect((error as SearchRunError).cause).toBeInstanceOf(BatchResultMissingError);
    expect(sink.records).toEqual([]);
  });

  it('ошибка sink пробрасывается как есть', async () => {
    const sink = new RecordingSink();
    let writes = 0;
    vi.spyOn(sink, 'write').mockImplementation(async () => {
      writes++;
      if (writes === 2) throw new Error('disk full');
    });

    await expect(runTopics(makeTopics(3), config(), new FakeBackend(), sink)).rejects.toThrow('disk full');
  });

  it('наблюдатель получает ровно один тик на топик независимо от батчей', async () => {
    const observer: RunObserver = {
      onTopic: vi.fn(),
      onBatch: vi.fn(),
      onComplete: vi.fn(),
    };

    await runTopics(makeTopics(5), config({ batchSize: 3 }), new FakeBackend(), new RecordingSink(), observer);

    expect(vi.mocked(observer.onTopic).mock.calls).toEqual([
      [1, 5, '1'],
      [2, 5, '2'],
      [3, 5, '3'],
      [4, 5, '4'],
      [5, 5, '5'],
    ]);
    expect(vi.mocked(observer.onBatch).mock.calls).toEqual([[3], [2]]);
    expect(observer.onComplete).toHaveBeenCalledWith(expect.objectContaining({ topics: 5, batches: 2 }));
  });

  it('источник короче заявленного count: хвост всё равно выполняется', async () => {
    const topics = [...makeTopics(3)];
    const source: TopicSource = {
      count: 5,
      [Symbol.iterator]: () => topics[Symbol.iterator](),
    };
    const backend = new FakeBackend();
    const sink = new RecordingSink();

    await runTopics(source, config({ batchSize: 2 }), backend, sink);

    expect(backend.batchCalls.map((c) => c.ids)).toEqual([['1', '2'], ['3']]);
    expect(sink.topicIds).toEqual(['1', '2', '3']);
  });

  it.each([
    [{ batchSize: 0 }, 'batchSize must be an integer >= 1, got 0'],
    [{ threads: 0 }, 'threads must be an integer >= 1, got 0'],
    [{ hits: -1 }, 'hits must be an integer >= 0, got -1'],
    [{ batchSize: 1.5 }, 'batchSize must be an integer >= 1, got 1.5'],
  ])('отклоняет невалидную конфигурацию %o до обращения к бэкенду', async (overrides, message) => {
    const backend = new FakeBackend();

    const run = runTopics(makeTopics(2), config(overrides), backend, new RecordingSink());

    await expect(run).rejects.toBeInstanceOf(ConfigError);
    await expect(run).rejects.toThrow(message);
    expect(backend.searchCalls).toEqual([]);
  });
});

describe('isSingleMode', () => {
  it('поштучный режим только при batchSize <= 1 и threads <= 1', () => {
    expect(isSingleMode(config())).toBe(true);
    expect(isSingleMode(config({ batchSize: 2 }))).toBe(false);
    expect(isSingleMode(config({ threads: 2 }))).toBe(false);
  });
});

describe('runTopics + TrecWriter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'topicrun-run-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function runToFile(name: string, runConfig: RunConfig, count = 7): Promise<string> {
    const path = join(tmpDir, name);
    const writer = new TrecWriter(path, { maxHits: runConfig.hits, tag: 'test' });
    await withOutputWriter(writer, (sink) => runTopics(makeTopics(count), runConfig, new FakeBackend(), sink));
    return readFile(path, 'utf-8');
  }

  it('поштучный и батч-режим дают побайтно одинаковый файл', async () => {
    const single = await runToFile('single.txt', config({ hits: 4 }));
    const batched = await runToFile('batched.txt', config({ hits: 4, batchSize: 5, threads: 4 }));

    expect(batched).toBe(single);
    expect(single.split('\n')[0]).toBe('1 Q0 q1-doc0 1 10.000000 test');
    expect(single.split('\n')).toHaveLength(7 * 4 + 1);
  });

  it('пустой источник даёт существующий пустой файл', async () => {
    const content = await runToFile('empty.txt', config({ batchSize: 3 }), 0);

    expect(content).toBe('');
    expect((await stat(join(tmpDir, 'empty.txt'))).size).toBe(0);
  });

  it('при ошибке бэкенда файл закрыт и содержит уже записанные строки', async () => {
    const path = join(tmpDir, 'partial.txt');
    const writer = new TrecWriter(path, { maxHits: 2, tag: 'test' });

    await expect(
      withOutputWriter(writer, (sink) =>
        runTopics(makeTopics(5), config({ hits: 2 }), new FakeBackend({ failOnText: 'q2' }), sink)),
    ).rejects.toBeInstanceOf(SearchRunError);

    expect(writer.isOpen).toBe(false);
    expect(await readFile(path, 'utf-8')).toBe(
      '1 Q0 q1-doc0 1 10.000000 test\n1 Q0 q1-doc1 2 9.000000 test\n',
    );
  });
});
