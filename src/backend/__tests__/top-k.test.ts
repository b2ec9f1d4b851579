import { describe, it, expect } from 'vitest';
import { compareHits, selectTopK } from '../top-k.js';

describe('selectTopK', () => {
  it('возвращает k лучших в порядке компаратора', () => {
    expect(selectTopK([5, 1, 4, 2, 3, 9, 0], 3, (a, b) => b - a)).toEqual([9, 5, 4]);
  });

  it('k больше числа элементов — все элементы отсортированы', () => {
    expect(selectTopK([2, 3, 1], 10, (a, b) => a - b)).toEqual([1, 2, 3]);
  });

  it('k = 0 — пустой результат', () => {
    expect(selectTopK([1, 2, 3], 0, (a, b) => a - b)).toEqual([]);
  });
});

describe('compareHits', () => {
  it('сортирует по score по убыванию, при равенстве по docId', () => {
    const hits = [
      { docId: 'b', score: 1 },
      { docId: 'c', score: 2 },
      { docId: 'a', score: 1 },
    ];

    expect([...hits].sort(compareHits).map((h) => h.docId)).toEqual(['c', 'a', 'b']);
  });
});
