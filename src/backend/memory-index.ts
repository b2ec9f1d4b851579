// Инвертированный индекс в памяти и его файловое представление.
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { IndexLoadError } from '../errors.js';

// Постинг: [docId, tf].
const PostingSchema = z.tuple([z.string(), z.number().int().min(1)]);

// Zod-схема файла индекса.
export const MemoryIndexFileSchema = z.object({
  version: z.literal(1),
  // ASCII-режим анализатора, которым построен индекс.
  ascii: z.boolean(),
  docCount: z.number().int().min(0),
  avgDocLength: z.number().min(0),
  docLengths: z.record(z.number().int().min(0)),
  postings: z.record(z.array(PostingSchema)),
});

export type MemoryIndexFile = z.infer<typeof MemoryIndexFileSchema>;

export interface Posting {
  docId: string;
  tf: number;
}

export interface PostingsList {
  term: string;
  df: number;
  postings: Posting[];
}

/**
 * Неизменяемый инвертированный индекс: term -> postings (отсортированы по docId).
 */
export class MemoryIndex {
  private readonly lists = new Map<string, PostingsList>();
  private readonly docLengths: Map<string, number>;
  readonly ascii: boolean;
  readonly docCount: number;
  readonly avgDocLength: number;

  constructor(file: MemoryIndexFile) {
    this.ascii = file.ascii;
    this.docCount = file.docCount;
    this.avgDocLength = file.avgDocLength;
    this.docLengths = new Map(Object.entries(file.docLengths));

    for (const [term, entries] of Object.entries(file.postings)) {
      const postings = entries
        .map(([docId, tf]) => ({ docId, tf }))
        .sort((a, b) => (a.docId < b.docId ? -1 : a.docId > b.docId ? 1 : 0));
      this.lists.set(term, { term, df: postings.length, postings });
    }
  }

  getPostings(term: string): PostingsList | undefined {
    return this.lists.get(term);
  }

  docLength(docId: string): number {
    return this.docLengths.get(docId) ?? 0;
  }

  get termCount(): number {
    return this.lists.size;
  }
}

// Читает и валидирует файл индекса; любая ошибка — IndexLoadError.
export async function loadMemoryIndex(path: string): Promise<MemoryIndex> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IndexLoadError(`Cannot read index file: ${path}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IndexLoadError(`Invalid JSON in index file: ${path}`, { cause: error });
  }

  const result = MemoryIndexFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new IndexLoadError(
      `Invalid index file ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
      { cause: result.error },
    );
  }

  return new MemoryIndex(result.data);
}

// Записывает файл индекса, создавая директорию при необходимости.
export async function writeMemoryIndex(path: string, file: MemoryIndexFile): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(file), 'utf-8');
}
