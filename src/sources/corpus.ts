// Сканирование и чтение JSONL-корпуса для построения индекса.
import fg from 'fast-glob';
import { readFile, stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';

// Документ корпуса.
export interface CorpusDocument {
  id: string;
  contents: string;
}

// Результат чтения корпуса.
export interface CorpusScanResult {
  files: string[];
  documents: CorpusDocument[];
}

const CorpusRecordSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((id) => String(id)),
  contents: z.string(),
  title: z.string().optional(),
});

// Шаблоны файлов корпуса внутри директории.
const CORPUS_PATTERNS = ['**/*.jsonl', '**/*.json'];

/**
 * Возвращает список файлов корпуса.
 * Файл возвращается как есть; директория сканируется fast-glob, порядок — лексикографический.
 */
export async function scanCorpusFiles(path: string): Promise<string[]> {
  const resolved = resolve(path);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(resolved)).isDirectory();
  } catch (error) {
    throw new ConfigError(`Corpus path not found: ${resolved}`, { cause: error });
  }

  if (!isDirectory) {
    return [resolved];
  }

  const files = await fg(CORPUS_PATTERNS, {
    cwd: resolved,
    ignore: ['**/node_modules/**', '**/.git/**'],
    dot: false,
    onlyFiles: true,
    absolute: true,
  });

  return files.sort();
}

// Парсит JSONL-файл корпуса: {"id", "contents", "title"?} на строку.
export function parseCorpus(content: string, fileName: string): CorpusDocument[] {
  const documents: CorpusDocument[] = [];

  content.split(/\r?\n/).forEach((line, i) => {
    if (line.trim().length === 0) return;

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new ConfigError(`${fileName}:${i + 1}: invalid JSON`, { cause: error });
    }

    const result = CorpusRecordSchema.safeParse(json);
    if (!result.success) {
      throw new ConfigError(`${fileName}:${i + 1}: expected {"id", "contents"} record`);
    }

    const { id, contents, title } = result.data;
    documents.push({ id, contents: title ? `${title}\n${contents}` : contents });
  });

  return documents;
}

// Повторяющийся id документа — ошибка корпуса, до построения индекса или загрузки в БД.
export function assertUniqueDocumentIds(documents: readonly CorpusDocument[]): void {
  const seen = new Set<string>();
  for (const doc of documents) {
    if (seen.has(doc.id)) {
      throw new ConfigError(`Duplicate document id "${doc.id}"`);
    }
    seen.add(doc.id);
  }
}

// Сканирует путь и читает все документы корпуса.
export async function readCorpus(path: string): Promise<CorpusScanResult> {
  const files = await scanCorpusFiles(path);
  const documents: CorpusDocument[] = [];

  for (const file of files) {
    const content = await readFile(file, 'utf-8');
    documents.push(...parseCorpus(content, file));
  }

  return { files, documents };
}
