// Выбор K лучших элементов через ограниченную min-кучу.
import type { Hit } from './types.js';

// Порядок результатов: score по убыванию, при равенстве — docId по возрастанию.
export function compareHits(a: Hit, b: Hit): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.docId === b.docId) {
    return 0;
  }
  return a.docId < b.docId ? -1 : 1;
}

// Бинарная куча; на вершине — худший из удерживаемых элементов.
class WorstFirstHeap<T> {
  private readonly data: T[] = [];

  // worse(a, b) === true, если a хуже b.
  constructor(private readonly worse: (a: T, b: T) => boolean) {}

  get size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.worseAt(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  // Заменяет вершину новым элементом и восстанавливает кучу.
  replaceTop(item: T): void {
    const a = this.data;
    a[0] = item;
    let i = 0;
    for (;;) {
      const left = i * 2 + 1;
      const right = left + 1;
      let worst = i;
      if (left < a.length && this.worseAt(left, worst)) worst = left;
      if (right < a.length && this.worseAt(right, worst)) worst = right;
      if (worst === i) return;
      this.swap(i, worst);
      i = worst;
    }
  }

  toArray(): T[] {
    return [...this.data];
  }

  private worseAt(i: number, j: number): boolean {
    const x = this.data[i];
    const y = this.data[j];
    return x !== undefined && y !== undefined && this.worse(x, y);
  }

  private swap(i: number, j: number): void {
    const x = this.data[i];
    const y = this.data[j];
    if (x === undefined || y === undefined) return;
    this.data[i] = y;
    this.data[j] = x;
  }
}

/**
 * Возвращает до k лучших элементов в порядке comparator
 * (a раньше b, если comparator(a, b) < 0).
 */
export function selectTopK<T>(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
  if (k <= 0) return [];

  const heap = new WorstFirstHeap<T>((a, b) => comparator(a, b) > 0);

  for (const item of items) {
    if (heap.size < k) {
      heap.push(item);
      continue;
    }
    const worst = heap.peek();
    if (worst !== undefined && comparator(item, worst) < 0) {
      heap.replaceTop(item);
    }
  }

  return heap.toArray().sort(comparator);
}
