import { z } from 'zod';

// Схема подключения к PostgreSQL.
export const DatabaseConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.number().default(5432),
  name: z.string().default('topicrun'),
  user: z.string().default('topicrun'),
  password: z.string().default('topicrun'),
});

// Режимы парсера запросов.
export const ParserConfigSchema = z.object({
  // ASCII-фолдинг: диакритика снимается, прочие не-ASCII символы — разделители.
  ascii: z.boolean().default(true),
  // Операторный парсер: +term обязателен, -term исключён.
  query: z.boolean().default(false),
});

// Схема параметров прогона.
export const SearchConfigSchema = z.object({
  hits: z.number().int().safe().min(0).default(1000),
  // Бюджет: сколько постингов обрабатывать на запрос.
  budget: z.number().int().safe().min(1).default(1_000_000_000),
  batchSize: z.number().int().min(1).default(1),
  threads: z.number().int().min(1).default(1),
  parser: ParserConfigSchema.default(() => ({ ascii: true, query: false })),
});

// Схема вывода результатов.
export const OutputConfigSchema = z.object({
  format: z.enum(['trec', 'msmarco', 'kilt']).default('trec'),
  // Тег прогона, если путь вывода задан явно.
  tag: z.string().default('topicrun'),
  // Директория для имени файла по умолчанию.
  dir: z.string().default('.'),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  database: DatabaseConfigSchema.default(() => ({
    host: 'localhost',
    port: 5432,
    name: 'topicrun',
    user: 'topicrun',
    password: 'topicrun',
  })),
  backend: z.enum(['memory', 'postgres']).default('memory'),
  search: SearchConfigSchema.default(() => ({
    hits: 1000,
    budget: 1_000_000_000,
    batchSize: 1,
    threads: 1,
    parser: { ascii: true, query: false },
  })),
  output: OutputConfigSchema.default(() => ({
    format: 'trec' as const,
    tag: 'topicrun',
    dir: '.',
  })),
  // Зарегистрированные индексы: имя -> путь к файлу индекса.
  indexes: z.record(z.string()).default({}),
  // Зарегистрированные наборы топиков: имя -> путь к файлу.
  topics: z.record(z.string()).default({}),
});

// Типы, выведенные из схем.
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type ParserConfig = z.infer<typeof ParserConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type OutputFormat = OutputConfig['format'];
export type BackendKind = z.infer<typeof AppConfigSchema>['backend'];
export type AppConfig = z.infer<typeof AppConfigSchema>;
