import { describe, expect, it } from 'vitest';
import { SerializationError } from '../errors.js';
import { serializeJson, sortNested, sortRecords, type RecordOrder } from './serialize.js';

describe('serializeJson', () => {
  it('sorts keys, indents by two spaces and ends with a newline', () => {
    const text = serializeJson({ b: 1, a: [1, {}], c: 'x', d: [] }, 'out.json');

    expect(text).toBe('{\n  "a": [\n    1,\n    {}\n  ],\n  "b": 1,\n  "c": "x",\n  "d": []\n}\n');
  });

  it('produces the same bytes regardless of key insertion order', () => {
    expect(serializeJson({ z: { y: 1, x: 2 }, a: null }, 'f')).toBe(serializeJson({ a: null, z: { x: 2, y: 1 } }, 'f'));
  });

  it('orders keys by code unit, not locale', () => {
    expect(serializeJson({ b: 1, B: 2, é: 3 }, 'f')).toBe('{\n  "B": 2,\n  "b": 1,\n  "é": 3\n}\n');
  });

  it('drops undefined properties but allows shared references', () => {
    const shared = { id: 1 };
    expect(serializeJson({ skip: undefined, left: shared, right: shared }, 'f')).toBe(
      '{\n  "left": {\n    "id": 1\n  },\n  "right": {\n    "id": 1\n  }\n}\n',
    );
  });

  it.each([
    ['undefined at the root', undefined, 'unsupported undefined at (root)'],
    ['an undefined array item', [1, undefined], 'unsupported undefined at /1'],
    ['a function', { fn: () => 1 }, 'unsupported function at /fn'],
    ['a bigint', { big: 1n }, 'unsupported bigint at /big'],
    ['a symbol', { sym: Symbol('x') }, 'unsupported symbol at /sym'],
    ['NaN', { n: Number.NaN }, 'non-finite number at /n'],
    ['Infinity', [Number.POSITIVE_INFINITY], 'non-finite number at /0'],
    ['a Date', { when: new Date(0) }, 'non-plain object at /when'],
  ])('rejects %s', (_label, value, reason) => {
    expect(() => serializeJson(value, 'bad.json')).toThrow(`Cannot serialize bad.json: ${reason}`);
  });

  it('rejects cycles', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.items = [node];

    expect(() => serializeJson(node, 'loop.json')).toThrow(SerializationError);
    expect(() => serializeJson(node, 'loop.json')).toThrow('circular reference at /items/0');
  });
});

describe('sortRecords', () => {
  it('orders by the key path', () => {
    const records = [{ movie: { ids: { trakt: 30 } } }, { movie: { ids: { trakt: 4 } } }, { movie: { ids: { trakt: 12 } } }];

    const sorted = sortRecords(records, { by: ['movie', 'ids', 'trakt'] }, 'f');

    expect(sorted).toEqual([
      { movie: { ids: { trakt: 4 } } },
      { movie: { ids: { trakt: 12 } } },
      { movie: { ids: { trakt: 30 } } },
    ]);
  });

  it('breaks ties by canonical JSON', () => {
    const sorted = sortRecords(
      [
        { rank: 1, title: 'b' },
        { title: 'a', rank: 1 },
      ],
      { by: ['rank'] },
      'f',
    );

    expect(sorted).toEqual([
      { title: 'a', rank: 1 },
      { rank: 1, title: 'b' },
    ]);
  });

  it('places numbers before strings and compares strings by code unit', () => {
    const sorted = sortRecords([{ k: 'b' }, { k: 'B' }, { k: 2 }], { by: ['k'] }, 'f');

    expect(sorted).toEqual([{ k: 2 }, { k: 'B' }, { k: 'b' }]);
  });

  it('does not depend on input order', () => {
    const records = [
      { id: 3, at: '2024-01-03' },
      { id: 1, at: '2024-01-01' },
      { id: 2, at: '2024-01-02' },
    ];

    const order: RecordOrder = { by: ['id'] };

    expect(sortRecords([...records].reverse(), order, 'f')).toEqual(sortRecords(records, order, 'f'));
  });

  it('orders nested arrays by their own keys', () => {
    const seasons: RecordOrder = { by: ['number'], nested: { episodes: { by: ['number'] } } };
    const records = [
      {
        show: { ids: { trakt: 2 } },
        seasons: [
          { number: 2, episodes: [{ number: 1 }] },
          { number: 1, episodes: [{ number: 3 }, { number: 1 }, { number: 2 }] },
        ],
      },
      { show: { ids: { trakt: 1 } } },
    ];

    const sorted = sortRecords(records, { by: ['show', 'ids', 'trakt'], nested: { seasons } }, 'f');

    expect(sorted).toEqual([
      { show: { ids: { trakt: 1 } } },
      {
        show: { ids: { trakt: 2 } },
        seasons: [
          { number: 1, episodes: [{ number: 1 }, { number: 2 }, { number: 3 }] },
          { number: 2, episodes: [{ number: 1 }] },
        ],
      },
    ]);
    expect(records[0]?.seasons?.[0]?.number).toBe(2);
  });

  it('orders the arrays of a single record', () => {
    const nested = { seasons: { by: ['number'] } };

    expect(sortNested({ aired: 2, seasons: [{ number: 2 }, { number: 1 }] }, nested, 'f')).toEqual({
      aired: 2,
      seasons: [{ number: 1 }, { number: 2 }],
    });
    expect(sortNested({ aired: 0 }, nested, 'f')).toEqual({ aired: 0 });
    expect(sortNested(null, nested, 'f')).toBeNull();
  });

  it('rejects a record without the sort key', () => {
    expect(() => sortRecords([{ id: 1 }, { name: 'x' }], { by: ['id'] }, 'watched/history.json')).toThrow(
      'Cannot serialize watched/history.json: record 1 has no id',
    );
  });
});
