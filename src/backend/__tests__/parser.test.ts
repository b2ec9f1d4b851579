import { describe, it, expect } from 'vitest';
import { assertAsciiMode, foldAscii, normalizeQueryText, parseQuery, tokenize } from '../parser.js';
import { ConfigError } from '../../errors.js';

describe('tokenize', () => {
  it('в ASCII-режиме снимает диакритику и режет по не-ASCII символам', () => {
    expect(foldAscii('Café Zürich')).toBe('Cafe Zurich');
    expect(tokenize('Café—Zürich 2024!', { ascii: true })).toEqual(['cafe', 'zurich', '2024']);
  });

  it('без ASCII-режима сохраняет юникодные буквы', () => {
    expect(tokenize('Café Zürich', { ascii: false })).toEqual(['café', 'zürich']);
  });
});

describe('parseQuery', () => {
  it('без операторного режима все термины — should, стоп-слова и повторы удалены', () => {
    expect(parseQuery('The red fox and the RED car', { ascii: true, query: false })).toEqual({
      should: ['red', 'fox', 'car'],
      must: [],
      mustNot: [],
    });
  });

  it('без операторного режима +/- считаются разделителями', () => {
    expect(parseQuery('+red -car', { ascii: true, query: false }).should).toEqual(['red', 'car']);
  });

  it('в операторном режиме разбирает +term и -term', () => {
    expect(parseQuery('+red fox -car', { ascii: true, query: true })).toEqual({
      should: ['fox'],
      must: ['red'],
      mustNot: ['car'],
    });
  });

  it('оператор применяется ко всем терминам составного токена', () => {
    expect(parseQuery('+new-york', { ascii: true, query: true }).must).toEqual(['new', 'york']);
  });
});

describe('normalizeQueryText', () => {
  it('фолдит текст только в ASCII-режиме', () => {
    expect(normalizeQueryText('crème brûlée', { ascii: true, query: false })).toBe('creme brulee');
    expect(normalizeQueryText('crème brûlée', { ascii: false, query: false })).toBe('crème brûlée');
  });
});

describe('assertAsciiMode', () => {
  it('совпадающий режим проходит', () => {
    expect(() => assertAsciiMode('idx.json', false, { ascii: false, query: true })).not.toThrow();
  });

  it('несовпадение режимов — ConfigError с подсказкой опции', () => {
    const check = (): void => assertAsciiMode('idx.json', false, { ascii: true, query: false });

    expect(check).toThrow(ConfigError);
    expect(check).toThrow('Index idx.json was built with ascii=false, but queries are parsed with ascii=true (use --no-ascii)');
  });
});
