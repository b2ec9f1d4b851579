// Типы модуля топиков.

// Один запрос: идентификатор и исходный текст.
export interface Topic {
  readonly id: string;
  readonly text: string;
}

// Формат файла топиков.
export type TopicsFormat = 'default' | 'kilt';

export const TOPICS_FORMATS: readonly TopicsFormat[] = ['default', 'kilt'];

/**
 * Источник топиков: упорядоченная конечная последовательность
 * с известным общим количеством (для прогресса и определения конца потока).
 */
export class TopicSet implements Iterable<Topic> {
  private readonly byId: Map<string, Topic>;

  constructor(
    readonly name: string,
    private readonly topics: readonly Topic[],
  ) {
    this.byId = new Map(topics.map((topic) => [topic.id, topic]));
  }

  get count(): number {
    return this.topics.length;
  }

  get(id: string): Topic | undefined {
    return this.byId.get(id);
  }

  [Symbol.iterator](): Iterator<Topic> {
    return this.topics[Symbol.iterator]();
  }
}
