import type { AppConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    name: 'topicrun',
    user: 'topicrun',
    password: 'topicrun',
  },
  backend: 'memory',
  search: {
    hits: 1000,
    budget: 1_000_000_000,
    batchSize: 1,
    threads: 1,
    parser: {
      ascii: true,
      query: false,
    },
  },
  output: {
    format: 'trec',
    tag: 'topicrun',
    dir: '.',
  },
  indexes: {},
  topics: {},
};
