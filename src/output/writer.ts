// Базовый файловый writer результатов с гарантированным закрытием.
import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Hit } from '../backend/types.js';
import type { OutputWriterOptions, RankedHit, ResultSink } from './types.js';

export abstract class OutputWriter implements ResultSink {
  private handle: FileHandle | null = null;
  private recordCount = 0;

  constructor(
    readonly path: string,
    protected readonly options: OutputWriterOptions,
  ) {}

  // Сериализует результаты одного топика; пустая строка — ничего не писать.
  protected abstract format(topicId: string, hits: RankedHit[]): string;

  get written(): number {
    return this.recordCount;
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  // Создаёт (или обрезает) файл вывода.
  async open(): Promise<void> {
    if (this.handle) {
      throw new Error(`Output writer is already open: ${this.path}`);
    }
    await mkdir(dirname(this.path), { recursive: true });
    this.handle = await open(this.path, 'w');
  }

  async write(topicId: string, hits: readonly Hit[]): Promise<void> {
    if (!this.handle) {
      throw new Error(`Output writer is not open: ${this.path}`);
    }

    const text = this.format(topicId, rankHits(hits, this.options.maxHits));
    if (text.length > 0) {
      await this.handle.write(text);
    }
    this.recordCount++;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;
    await handle.close();
  }
}

/**
 * Назначает ранги с 1, пропуская повторные docId и обрезая по maxHits.
 */
export function rankHits(hits: readonly Hit[], maxHits: number): RankedHit[] {
  const seen = new Set<string>();
  const ranked: RankedHit[] = [];

  for (const hit of hits) {
    if (ranked.length >= maxHits) break;
    if (seen.has(hit.docId)) continue;
    seen.add(hit.docId);
    ranked.push({ ...hit, rank: ranked.length + 1 });
  }

  return ranked;
}

/**
 * Открывает writer, выполняет fn и закрывает writer на любом пути выхода.
 * Уже записанные строки остаются на диске и при ошибке.
 */
export async function withOutputWriter<T>(
  writer: OutputWriter,
  fn: (sink: OutputWriter) => Promise<T>,
): Promise<T> {
  await writer.open();
  try {
    return await fn(writer);
  } finally {
    await writer.close();
  }
}
