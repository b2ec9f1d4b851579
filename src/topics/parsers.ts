// Парсеры файлов топиков.
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { Topic } from './types.js';

// Поля JSONL-записи, из которых берётся текст запроса (по приоритету).
const TEXT_FIELDS = ['title', 'query', 'text', 'contents'] as const;

const TopicIdSchema = z.union([z.string(), z.number()]).transform((id) => String(id));

const JsonTopicSchema = z.object({
  id: TopicIdSchema,
  title: z.string().optional(),
  query: z.string().optional(),
  text: z.string().optional(),
  contents: z.string().optional(),
});

const KiltTopicSchema = z.object({
  id: TopicIdSchema,
  input: z.string(),
});

// Разбивает содержимое на непустые строки с номерами (1-based).
function nonEmptyLines(content: string): Array<{ line: string; lineNo: number }> {
  return content
    .split(/\r?\n/)
    .map((line, i) => ({ line, lineNo: i + 1 }))
    .filter(({ line }) => line.trim().length > 0);
}

function parseJsonLine(line: string, lineNo: number): unknown {
  try {
    return JSON.parse(line);
  } catch (error) {
    throw new ConfigError(`Invalid JSON on line ${lineNo}`, { cause: error });
  }
}

// Формат "id<TAB>query" (msmarco-подобные .tsv).
export function parseTsvTopics(content: string): Topic[] {
  return nonEmptyLines(content).map(({ line, lineNo }) => {
    const tab = line.indexOf('\t');
    if (tab <= 0) {
      throw new ConfigError(`Expected "id<TAB>query" on line ${lineNo}`);
    }
    return { id: line.slice(0, tab).trim(), text: line.slice(tab + 1).trim() };
  });
}

// JSONL: {"id": ..., "title" | "query" | "text" | "contents": ...}.
export function parseJsonlTopics(content: string): Topic[] {
  return nonEmptyLines(content).map(({ line, lineNo }) => {
    const result = JsonTopicSchema.safeParse(parseJsonLine(line, lineNo));
    if (!result.success) {
      throw new ConfigError(`Invalid topic record on line ${lineNo}: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }
    const record = result.data;
    const field = TEXT_FIELDS.find((name) => record[name] !== undefined);
    if (!field) {
      throw new ConfigError(`Topic "${record.id}" on line ${lineNo} has no query text`);
    }
    return { id: record.id, text: record[field] ?? '' };
  });
}

// KILT: {"id": ..., "input": ...}.
export function parseKiltTopics(content: string): Topic[] {
  return nonEmptyLines(content).map(({ line, lineNo }) => {
    const result = KiltTopicSchema.safeParse(parseJsonLine(line, lineNo));
    if (!result.success) {
      throw new ConfigError(`Invalid KILT record on line ${lineNo}: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }
    return { id: result.data.id, text: result.data.input };
  });
}

const TOP_BLOCK = /<top>([\s\S]*?)<\/top>/gi;
const NUM_FIELD = /<num>\s*(?:Number:)?\s*(\S+)/i;
// Заголовок тянется до следующего тега или конца блока.
const TITLE_FIELD = /<title>\s*(?:Topic:)?([\s\S]*?)(?=<\/?[a-z]+>|$)/i;

// Классические TREC-топики: блоки <top> с полями <num> и <title>.
export function parseTrecTopics(content: string): Topic[] {
  const topics: Topic[] = [];

  for (const match of content.matchAll(TOP_BLOCK)) {
    const block = match[1] ?? '';
    const id = NUM_FIELD.exec(block)?.[1];
    const title = TITLE_FIELD.exec(block)?.[1];
    if (id === undefined || title === undefined) {
      throw new ConfigError(`TREC topic block #${topics.length + 1} is missing <num> or <title>`);
    }
    topics.push({ id, text: title.replace(/\s+/g, ' ').trim() });
  }

  return topics;
}

// Проверяет уникальность id: результаты батча сопоставляются по id.
export function assertUniqueIds(topics: readonly Topic[]): void {
  const seen = new Set<string>();
  for (const topic of topics) {
    if (seen.has(topic.id)) {
      throw new ConfigError(`Duplicate topic id "${topic.id}"`);
    }
    seen.add(topic.id);
  }
}
