import { describe, it, expect } from 'vitest';
import { copyRecord, frozenCopy } from '../../src/cache/DataCopy.js';
import { computeFingerprint, isPlainData, stableStringify } from '../../src/cache/Fingerprint.js';

describe('stableStringify', () => {
  it.each([
    ['Maps of different sizes', new Map([['a', 1]]), new Map([['a', 1], ['b', 2]])],
    ['a Map and an empty object', new Map([['a', 1]]), {}],
    ['a Set and an empty object', new Set(['a']), {}],
    ['a Date and its ISO string', new Date(0), '1970-01-01T00:00:00.000Z'],
    ['NaN and null', NaN, null],
    ['Infinity and null', Infinity, null],
    ['-Infinity and Infinity', -Infinity, Infinity],
    ['-0 and 0', -0, 0],
    ['a bigint and its string', 1n, '1n'],
    ['a bigint and a number', 1n, 1],
    ['undefined and a marker string', undefined, '[undefined]'],
    ['a tagged-looking object and a Map', { $map: [['a', 1]] }, new Map([['a', 1]])],
    ['a tagged-looking object and undefined', { $undefined: true }, undefined],
  ])('should keep %s apart', (_label, left, right) => {
    const a = stableStringify({ value: left });
    const b = stableStringify({ value: right });

    expect(a).toBeDefined();
    expect(b).toBeDefined();
    expect(a).not.toBe(b);
  });

  it('should encode values JSON has no form for as tags', () => {
    expect(stableStringify(new Map([['a', 1]]))).toBe('{"$map":[["a",1]]}');
    expect(stableStringify(new Set([2, 1]))).toBe('{"$set":[1,2]}');
    expect(stableStringify(new Date(0))).toBe('{"$date":"1970-01-01T00:00:00.000Z"}');
    expect(stableStringify(new Date(NaN))).toBe('{"$date":"Invalid Date"}');
    expect(stableStringify(NaN)).toBe('{"$number":"NaN"}');
    expect(stableStringify(-Infinity)).toBe('{"$number":"-Infinity"}');
    expect(stableStringify(-0)).toBe('{"$number":"-0"}');
    expect(stableStringify(10n)).toBe('{"$bigint":"10"}');
  });

  it('should escape object keys that start with $', () => {
    expect(stableStringify({ $map: 1 })).toBe('{"$$map":1}');
    expect(stableStringify({ $$map: 1 })).toBe('{"$$$map":1}');
  });

  it('should ignore Map and Set insertion order', () => {
    expect(
      stableStringify(
        new Map([
          ['b', 2],
          ['a', 1],
        ]),
      ),
    ).toBe(
      stableStringify(
        new Map([
          ['a', 1],
          ['b', 2],
        ]),
      ),
    );
    expect(stableStringify(new Set(['y', 'x']))).toBe(stableStringify(new Set(['x', 'y'])));
  });

  it('should encode a value reached twice without a cycle', () => {
    const shared = { id: 1 };

    expect(stableStringify({ left: shared, right: shared })).toBe('{"left":{"id":1},"right":{"id":1}}');
  });

  it('should have no encoding for functions, symbols or class instances', () => {
    class Connection {
      readonly host = 'localhost';
    }

    expect(stableStringify({ run: () => 1 })).toBeUndefined();
    expect(stableStringify({ key: Symbol('key') })).toBeUndefined();
    expect(stableStringify({ connection: new Connection() })).toBeUndefined();
    expect(stableStringify([new Map([['fn', () => 1]])])).toBeUndefined();
    expect(isPlainData(new Connection())).toBe(false);
    expect(isPlainData({ list: [1, 'two', null] })).toBe(true);
  });
});

describe('computeFingerprint', () => {
  it('should differ for inputs that plain JSON would merge', () => {
    const map = computeFingerprint('tool', { entries: new Map([['a', 1]]) });
    const empty = computeFingerprint('tool', { entries: {} });

    expect(map).toMatch(/^[0-9a-f]{64}$/);
    expect(map).not.toBe(empty);
  });

  it('should be undefined for an input that cannot be encoded', () => {
    expect(computeFingerprint('tool', { callback: () => undefined })).toBeUndefined();
  });
});

describe('copyRecord', () => {
  it('should deep-copy plain data and keep other values by reference', () => {
    const callback = (): number => 1;
    const source = { items: ['a'], when: new Date(0), callback };

    const copy = copyRecord(source);
    source.items.push('b');

    expect(copy.items).toEqual(['a']);
    expect(copy.when).toEqual(new Date(0));
    expect(copy.when).not.toBe(source.when);
    expect(copy.callback).toBe(callback);
  });
});

describe('frozenCopy', () => {
  it('should return a frozen copy of plain data', () => {
    const source = { nested: { list: [1] } };

    const copy = frozenCopy(source);

    expect(copy).toEqual(source);
    expect(copy).not.toBe(source);
    expect(Object.isFrozen(copy.nested.list)).toBe(true);
    expect(Object.isFrozen(source)).toBe(false);
  });
});
