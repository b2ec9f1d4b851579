import { describe, it, expect } from 'vitest';
import {
  assertUniqueIds,
  parseJsonlTopics,
  parseKiltTopics,
  parseTrecTopics,
  parseTsvTopics,
} from '../parsers.js';
import { ConfigError } from '../../errors.js';

describe('parseTsvTopics', () => {
  it('читает пары id<TAB>query в порядке файла, пропуская пустые строки', () => {
    const topics = parseTsvTopics('2\tblue whale\n\n1\tred fox  \n');

    expect(topics).toEqual([
      { id: '2', text: 'blue whale' },
      { id: '1', text: 'red fox' },
    ]);
  });

  it('отклоняет строку без табуляции с номером строки', () => {
    expect(() => parseTsvTopics('1\tok\nbroken line')).toThrow('Expected "id<TAB>query" on line 2');
  });
});

describe('parseJsonlTopics', () => {
  it('берёт текст из первого доступного поля и приводит числовой id к строке', () => {
    const content = [
      JSON.stringify({ id: 301, title: 'organized crime' }),
      JSON.stringify({ id: 'q2', query: 'solar power' }),
      JSON.stringify({ id: 'q3', contents: 'river delta' }),
    ].join('\n');

    expect(parseJsonlTopics(content)).toEqual([
      { id: '301', text: 'organized crime' },
      { id: 'q2', text: 'solar power' },
      { id: 'q3', text: 'river delta' },
    ]);
  });

  it('title имеет приоритет над query', () => {
    const content = JSON.stringify({ id: '1', query: 'second', title: 'first' });
    expect(parseJsonlTopics(content)).toEqual([{ id: '1', text: 'first' }]);
  });

  it('выбрасывает ConfigError для записи без текста', () => {
    expect(() => parseJsonlTopics('{"id":"7"}')).toThrow('Topic "7" on line 1 has no query text');
  });

  it('выбрасывает ConfigError для невалидного JSON', () => {
    expect(() => parseJsonlTopics('{oops')).toThrow(ConfigError);
  });
});

describe('parseKiltTopics', () => {
  it('читает id и input', () => {
    const content = '{"id":"k1","input":"who wrote hamlet"}\n{"id":"k2","input":"capital of peru"}';

    expect(parseKiltTopics(content)).toEqual([
      { id: 'k1', text: 'who wrote hamlet' },
      { id: 'k2', text: 'capital of peru' },
    ]);
  });

  it('отклоняет запись без input', () => {
    expect(() => parseKiltTopics('{"id":"k1"}')).toThrow('Invalid KILT record on line 1');
  });
});

describe('parseTrecTopics', () => {
  it('извлекает номер и заголовок из блоков <top>', () => {
    const content = `
<top>
<num> Number: 301
<title> International Organized
  Crime

<desc> Description:
Identify organizations.
</top>

<top>
<num> Number: 302
<title> Topic: Poliomyelitis and Post-Polio
<narr> Narrative:
Anything.
</top>
`;

    expect(parseTrecTopics(content)).toEqual([
      { id: '301', text: 'International Organized Crime' },
      { id: '302', text: 'Poliomyelitis and Post-Polio' },
    ]);
  });

  it('выбрасывает ошибку для блока без <title>', () => {
    expect(() => parseTrecTopics('<top><num> Number: 1 </top>')).toThrow('missing <num> or <title>');
  });
});

describe('assertUniqueIds', () => {
  it('выбрасывает ConfigError на повторяющемся id', () => {
    const topics = [
      { id: '1', text: 'a' },
      { id: '1', text: 'b' },
    ];
    expect(() => assertUniqueIds(topics)).toThrow('Duplicate topic id "1"');
  });
});
