// Команда topicrun search — прогон набора топиков через поисковый бэкенд.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import type { AppConfig, BackendKind, OutputFormat } from '../config/schema.js';
import { createSearchBackend, parseBackendKind } from '../backend/index.js';
import type { ParserOptions } from '../backend/index.js';
import { ConfigError, errorMessage } from '../errors.js';
import { createOutputWriter, parseOutputFormat, resolveOutputTarget, withOutputWriter } from '../output/index.js';
import { ConsoleRunProgress, runTopics, validateRunConfig } from '../runner/index.js';
import type { RunConfig, RunObserver, RunSummary } from '../runner/index.js';
import { parseTopicsFormat, readTopics } from '../topics/index.js';

// Параметры команды search в том виде, в каком их отдаёт commander.
export interface SearchOptions {
  index: string;
  topics: string;
  topicsFormat: string;
  hits?: string;
  rho?: string;
  batchSize?: string;
  threads?: string;
  ascii?: boolean;
  query?: boolean;
  backend?: string;
  outputFormat?: string;
  output?: string;
  config?: string;
}

// Итоговые настройки прогона: CLI поверх конфигурации.
export interface SearchSettings {
  run: RunConfig;
  parser: ParserOptions;
  backend: BackendKind;
  format: OutputFormat;
}

export interface SearchResult {
  path: string;
  summary: RunSummary;
}

// Целое из строки опции; дробные, нечисловые и выходящие за safe integer значения — ConfigError.
export function parseIntegerOption(name: string, value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
    throw new ConfigError(`--${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function pickInteger(name: string, value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : parseIntegerOption(name, value);
}

/**
 * Накладывает опции командной строки на секции search/output/backend конфигурации
 * и проверяет числовые параметры прогона.
 */
export function resolveSearchSettings(config: AppConfig, options: SearchOptions): SearchSettings {
  const run: RunConfig = {
    hits: pickInteger('hits', options.hits, config.search.hits),
    budget: pickInteger('rho', options.rho, config.search.budget),
    batchSize: pickInteger('batch-size', options.batchSize, config.search.batchSize),
    threads: pickInteger('threads', options.threads, config.search.threads),
  };
  validateRunConfig(run);

  return {
    run,
    parser: {
      ascii: options.ascii ?? config.search.parser.ascii,
      query: options.query ?? config.search.parser.query,
    },
    backend: options.backend ? parseBackendKind(options.backend) : config.backend,
    format: options.outputFormat ? parseOutputFormat(options.outputFormat) : config.output.format,
  };
}

/**
 * Полный прогон: топики и бэкенд открываются до создания файла вывода,
 * поэтому ошибки конфигурации и загрузки индекса не оставляют пустой файл.
 */
export async function executeSearch(
  config: AppConfig,
  options: SearchOptions,
  observer: RunObserver = new ConsoleRunProgress(),
): Promise<SearchResult> {
  const settings = resolveSearchSettings(config, options);
  const topics = await readTopics(options.topics, parseTopicsFormat(options.topicsFormat), config.topics);

  const backend = await createSearchBackend(config, {
    kind: settings.backend,
    indexRef: options.index,
    parser: settings.parser,
    threads: settings.run.threads,
  });

  try {
    const target = resolveOutputTarget({
      output: options.output,
      topicsName: topics.name,
      budget: settings.run.budget,
      dir: config.output.dir,
      tag: config.output.tag,
    });

    console.log(`Прогон ${topics.name} (${topics.count} топиков, бэкенд ${backend.name}) -> ${target.path}`);

    const writer = createOutputWriter(target.path, settings.format, {
      maxHits: settings.run.hits,
      tag: target.tag,
      topics,
    });
    const summary = await withOutputWriter(writer, (sink) =>
      runTopics(topics, settings.run, backend, sink, observer));

    return { path: target.path, summary };
  } finally {
    await backend.close();
  }
}

export const searchCommand = new Command('search')
  .description('Run a topic set against an index and write a run file')
  .requiredOption('-i, --index <path-or-name>', 'Index file, registered index name or postgres collection')
  .requiredOption('-t, --topics <path-or-name>', 'Topics file or registered topics name')
  .option('--topics-format <format>', 'Topics format: default | kilt', 'default')
  .option('--hits <num>', 'Number of hits per topic')
  .option('--rho <num>', 'Postings budget per query')
  .option('--batch-size <num>', 'Topics per batch')
  .option('--threads <num>', 'Concurrent queries inside a batch')
  .option('--ascii', 'Fold query text to ASCII')
  .option('--no-ascii', 'Keep non-ASCII letters in query terms')
  .option('--query', 'Operator query parser (+term, -term)')
  .option('--backend <name>', 'Search backend: memory | postgres')
  .option('--output-format <format>', 'Run file format: trec | msmarco | kilt')
  .option('-o, --output <path>', 'Run file path')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: SearchOptions) => {
    try {
      const config = await loadConfig(options.config);
      const { path } = await executeSearch(config, options);
      console.log(`Результаты записаны: ${path}`);
    } catch (error) {
      console.error(`Ошибка поиска: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
