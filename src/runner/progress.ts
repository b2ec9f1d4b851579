// Репортеры прогресса прогона.
import type { RunObserver, RunSummary } from './types.js';

// Сколько строк прогресса печатать за прогон.
const PROGRESS_STEPS = 20;

// Вывод прогресса в консоль.
export class ConsoleRunProgress implements RunObserver {
  onTopic(current: number, total: number): void {
    const step = Math.max(1, Math.ceil(total / PROGRESS_STEPS));
    if (current % step === 0 || current === total) {
      console.log(`  Топики: ${current}/${total}`);
    }
  }

  onBatch(): void {
    // Границы батчей в консоль не выводятся.
  }

  onComplete(summary: RunSummary): void {
    const seconds = (summary.durationMs / 1000).toFixed(1);
    console.log(`  Готово: ${summary.topics} топиков, ${summary.batches} вызовов поиска за ${seconds}с`);
  }
}

// Пустой наблюдатель по умолчанию.
export class NoopRunObserver implements RunObserver {
  onTopic(): void {}

  onBatch(): void {}

  onComplete(): void {}
}
