// Форматы файлов прогона.
import type { RankedHit } from './types.js';
import { OutputWriter } from './writer.js';

// TREC run: "qid Q0 docid rank score tag".
export class TrecWriter extends OutputWriter {
  protected format(topicId: string, hits: RankedHit[]): string {
    return hits
      .map((hit) => `${topicId} Q0 ${hit.docId} ${hit.rank} ${hit.score.toFixed(6)} ${this.options.tag}\n`)
      .join('');
  }
}

// MS MARCO: "qid<TAB>docid<TAB>rank".
export class MsMarcoWriter extends OutputWriter {
  protected format(topicId: string, hits: RankedHit[]): string {
    return hits.map((hit) => `${topicId}\t${hit.docId}\t${hit.rank}\n`).join('');
  }
}

// KILT: одна JSON-строка на топик, провенанс в порядке ранга.
export class KiltWriter extends OutputWriter {
  protected format(topicId: string, hits: RankedHit[]): string {
    const record = {
      id: topicId,
      input: this.options.topics?.get(topicId)?.text ?? '',
      output: [
        {
          provenance: hits.map((hit) => ({ wikipedia_id: hit.docId })),
        },
      ],
    };
    return `${JSON.stringify(record)}\n`;
  }
}
