// Парсер запросов: ASCII-фолдинг, токенизация, операторы +term/-term.
import { ConfigError } from '../errors.js';
import type { ParserOptions } from './types.js';

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'but', 'by', 'for', 'if', 'in',
  'into', 'is', 'it', 'no', 'not', 'of', 'on', 'or', 'such', 'that', 'the',
  'their', 'then', 'there', 'these', 'they', 'this', 'to', 'was', 'will', 'with',
]);

const ASCII_TERM = /[a-z0-9]+/g;
const UNICODE_TERM = /[\p{L}\p{N}]+/gu;

// Разобранный запрос.
export interface ParsedQuery {
  should: string[];
  must: string[];
  mustNot: string[];
}

// Снимает диакритику (NFKD + удаление combining marks).
export function foldAscii(text: string): string {
  return text.normalize('NFKD').replace(/\p{M}+/gu, '');
}

/**
 * Разбивает текст на термины в нижнем регистре.
 * В ASCII-режиме всё, что не [a-z0-9] после фолдинга, — разделитель.
 */
export function tokenize(text: string, options: { ascii: boolean }): string[] {
  const normalized = (options.ascii ? foldAscii(text) : text).toLowerCase();
  const pattern = options.ascii ? ASCII_TERM : UNICODE_TERM;
  return normalized.match(pattern) ?? [];
}

// Термины без стоп-слов: так анализируются и документы, и запросы.
export function analyzeText(text: string, ascii: boolean): string[] {
  return tokenize(text, { ascii }).filter((term) => !STOP_WORDS.has(term));
}

function unique(terms: string[]): string[] {
  return [...new Set(terms)];
}

// Разбирает запрос согласно режимам парсера.
export function parseQuery(text: string, options: ParserOptions): ParsedQuery {
  if (!options.query) {
    return { should: unique(analyzeText(text, options.ascii)), must: [], mustNot: [] };
  }

  const should: string[] = [];
  const must: string[] = [];
  const mustNot: string[] = [];

  for (const raw of text.split(/\s+/)) {
    if (raw.length === 0) continue;

    const operator = raw[0];
    const terms = analyzeText(operator === '+' || operator === '-' ? raw.slice(1) : raw, options.ascii);
    if (operator === '+') {
      must.push(...terms);
    } else if (operator === '-') {
      mustNot.push(...terms);
    } else {
      should.push(...terms);
    }
  }

  return { should: unique(should), must: unique(must), mustNot: unique(mustNot) };
}

// Текст запроса после фолдинга — для бэкендов с собственным анализатором.
export function normalizeQueryText(text: string, options: ParserOptions): string {
  return options.ascii ? foldAscii(text) : text;
}

/**
 * Индекс и запросы должны анализироваться в одном ASCII-режиме:
 * иначе термины с диакритикой молча перестают совпадать.
 */
export function assertAsciiMode(indexName: string, indexAscii: boolean, parser: ParserOptions): void {
  if (indexAscii !== parser.ascii) {
    throw new ConfigError(
      `Index ${indexName} was built with ascii=${indexAscii}, but queries are parsed with ascii=${parser.ascii}` +
      ` (use ${indexAscii ? '--ascii' : '--no-ascii'})`,
    );
  }
}
