// Построение файла индекса для MemorySearchBackend из документов корпуса.
import { ConfigError } from '../errors.js';
import type { CorpusDocument } from '../sources/corpus.js';
import type { MemoryIndexFile } from './memory-index.js';
import { analyzeText } from './parser.js';

export interface BuildOptions {
  ascii: boolean;
}

export function buildMemoryIndex(
  documents: Iterable<CorpusDocument>,
  options: BuildOptions = { ascii: true },
): MemoryIndexFile {
  const docLengths = new Map<string, number>();
  const postings = new Map<string, Array<[string, number]>>();
  let totalLength = 0;

  for (const doc of documents) {
    if (docLengths.has(doc.id)) {
      throw new ConfigError(`Duplicate document id "${doc.id}"`);
    }

    const terms = analyzeText(doc.contents, options.ascii);
    const termFreqs = new Map<string, number>();
    for (const term of terms) {
      termFreqs.set(term, (termFreqs.get(term) ?? 0) + 1);
    }

    for (const [term, tf] of termFreqs) {
      let list = postings.get(term);
      if (!list) {
        list = [];
        postings.set(term, list);
      }
      list.push([doc.id, tf]);
    }

    docLengths.set(doc.id, terms.length);
    totalLength += terms.length;
  }

  const docCount = docLengths.size;

  return {
    version: 1,
    ascii: options.ascii,
    docCount,
    avgDocLength: docCount > 0 ? totalLength / docCount : 0,
    docLengths: Object.fromEntries(docLengths),
    postings: Object.fromEntries(postings),
  };
}
