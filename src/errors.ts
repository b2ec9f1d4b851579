// Типизированные ошибки запуска.

// Ошибка конфигурации: невалидные параметры, неизвестные имена, битые файлы топиков.
// Обнаруживается до начала цикла поиска.
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

// Ошибка загрузки индекса (файл не найден, невалидный формат, пустая коллекция).
export class IndexLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IndexLoadError';
  }
}

// Бэкенд вернул батч без результата для одного из запрошенных id.
export class BatchResultMissingError extends Error {
  readonly topicId: string;

  constructor(topicId: string) {
    super(`Backend returned no results for topic "${topicId}"`);
    this.name = 'BatchResultMissingError';
    this.topicId = topicId;
  }
}

// Фатальная ошибка выполнения запроса: весь прогон прерывается.
export class SearchRunError extends Error {
  readonly topicIds: string[];
  readonly dispatched: number;

  constructor(topicIds: string[], dispatched: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Search failed for topic(s) ${topicIds.join(', ')} after ${dispatched} result(s) written: ${reason}`,
      { cause },
    );
    this.name = 'SearchRunError';
    this.topicIds = topicIds;
    this.dispatched = dispatched;
  }
}

// Приводит произвольную ошибку к тексту для вывода в консоль.
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
