import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { parseTopicsFormat, readTopics, resolveTopics } from '../reader.js';
import { ConfigError } from '../../errors.js';

describe('topics reader', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'topicrun-topics-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('читает файл по пути, имя набора — базовое имя без расширения', async () => {
    const path = join(tmpDir, 'dev-small.tsv');
    await writeFile(path, '10\tfirst\n20\tsecond\n30\tthird\n');

    const topics = await readTopics(path, 'default');

    expect(topics.name).toBe('dev-small');
    expect(topics.count).toBe(3);
    expect([...topics].map((t) => t.id)).toEqual(['10', '20', '30']);
    expect(topics.get('20')?.text).toBe('second');
  });

  it('находит набор по имени из реестра', async () => {
    const path = join(tmpDir, 'robust.jsonl');
    await writeFile(path, '{"id":"301","title":"organized crime"}\n');

    const resolved = await resolveTopics('robust04', { robust04: path });

    expect(resolved).toEqual({ name: 'robust04', path });
  });

  it('читает KILT-формат независимо от расширения', async () => {
    const path = join(tmpDir, 'nq-dev.txt');
    await writeFile(path, '{"id":"a","input":"tallest mountain"}\n');

    const topics = await readTopics(path, 'kilt');

    expect([...topics]).toEqual([{ id: 'a', text: 'tallest mountain' }]);
  });

  it('выбрасывает ConfigError для неизвестного имени', async () => {
    await expect(readTopics('no-such-topics', 'default', { robust04: '/x.tsv' }))
      .rejects.toThrow('Unknown topics "no-such-topics": not a file and not registered (registered: robust04)');
  });

  it('выбрасывает ConfigError для неподдерживаемого расширения', async () => {
    const path = join(tmpDir, 'topics.csv');
    await writeFile(path, '1,query');

    await expect(readTopics(path, 'default')).rejects.toBeInstanceOf(ConfigError);
  });

  it('добавляет путь к ошибке парсинга', async () => {
    const path = join(tmpDir, 'broken.tsv');
    await writeFile(path, 'no tab here\n');

    await expect(readTopics(path, 'default'))
      .rejects.toThrow(`${path}: Expected "id<TAB>query" on line 1`);
  });

  it('отклоняет дубликаты id', async () => {
    const path = join(tmpDir, 'dup.tsv');
    await writeFile(path, '1\ta\n1\tb\n');

    await expect(readTopics(path, 'default')).rejects.toThrow('Duplicate topic id "1"');
  });

  it('пустой файл даёт пустой набор', async () => {
    const path = join(tmpDir, 'empty.tsv');
    await writeFile(path, '');

    const topics = await readTopics(path, 'default');

    expect(topics.count).toBe(0);
  });
});

describe('parseTopicsFormat', () => {
  it('принимает известные форматы', () => {
    expect(parseTopicsFormat('kilt')).toBe('kilt');
  });

  it('отклоняет неизвестный формат', () => {
    expect(() => parseTopicsFormat('csv')).toThrow('Unknown topics format "csv". Available: default, kilt');
  });
});
