// Barrel-файл модуля корпуса.
export type { CorpusDocument, CorpusScanResult } from './corpus.js';
export { scanCorpusFiles, parseCorpus, readCorpus, assertUniqueDocumentIds } from './corpus.js';
