import { ConfigError } from '../errors.js';
import { KiltWriter, MsMarcoWriter, TrecWriter } from './formats.js';
import { OUTPUT_FORMATS } from './types.js';
import type { OutputFormat, OutputWriterOptions } from './types.js';
import type { OutputWriter } from './writer.js';

export function parseOutputFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new ConfigError(`Unknown output format "${value}". Available: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

// Создание writer по формату; файл не открывается до withOutputWriter.
export function createOutputWriter(
  path: string,
  format: OutputFormat,
  options: OutputWriterOptions,
): OutputWriter {
  switch (format) {
  case 'trec':
    return new TrecWriter(path, options);
  case 'msmarco':
    return new MsMarcoWriter(path, options);
  case 'kilt':
    return new KiltWriter(path, options);
  default: {
    const unknown: never = format;
    throw new ConfigError(`Unsupported output format: ${String(unknown)}`);
  }
  }
}
