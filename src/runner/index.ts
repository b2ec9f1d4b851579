// Barrel-файл модуля прогона.
export type { ResultPair, RunConfig, RunObserver, RunSummary, StepOutcome, TopicSource } from './types.js';
export { reprojectBatch } from './reproject.js';
export { ConsoleRunProgress, NoopRunObserver } from './progress.js';
export {
  runTopics,
  executeSingle,
  executeBatch,
  isSingleMode,
  validateRunConfig,
} from './orchestrator.js';
