// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  DatabaseConfigSchema,
  ParserConfigSchema,
  SearchConfigSchema,
  OutputConfigSchema,
} from './schema.js';

export type {
  AppConfig,
  BackendKind,
  DatabaseConfig,
  OutputConfig,
  OutputFormat,
  ParserConfig,
  SearchConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export { loadConfig, parseConfig, resolveConfigPath, resolveEnvVars, deepMerge } from './loader.js';
