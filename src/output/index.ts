// Barrel-файл модуля вывода.
export type { OutputFormat, OutputWriterOptions, RankedHit, ResultSink } from './types.js';
export { OUTPUT_FORMATS } from './types.js';
export { OutputWriter, rankHits, withOutputWriter } from './writer.js';
export { TrecWriter, MsMarcoWriter, KiltWriter } from './formats.js';
export { createOutputWriter, parseOutputFormat } from './factory.js';
export type { OutputTarget, OutputTargetInput } from './naming.js';
export { defaultRunName, resolveOutputTarget } from './naming.js';
