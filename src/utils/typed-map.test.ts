import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { TypedMap } from './typed-map.js';

describe('TypedMap', () => {
  it('can be empty', () => {
    const map = TypedMap.fromEntries<string, number>([]);
    expect(map.size).toBe(0);
    expect(map.get('a')).toBeUndefined();
  });

  it('keeps insertion order from fromEntries', () => {
    const map = TypedMap.fromEntries([
      ['ROW_NAMES', 1],
      ['PUBLICATION_ROW_ORDER', 2],
    ]);
    expect([...map.keys()]).toEqual(['ROW_NAMES', 'PUBLICATION_ROW_ORDER']);
    expect([...map.entries()]).toEqual([
      ['ROW_NAMES', 1],
      ['PUBLICATION_ROW_ORDER', 2],
    ]);
  });

  it('lets later entries win', () => {
    const map = TypedMap.fromEntries([
      ['a', 1],
      ['a', 2],
    ]);
    expect(map.size).toBe(1);
    expect(map.get('a')).toBe(2);
  });

  it('treats prototype names as ordinary keys', () => {
    const empty = TypedMap.fromEntries<string, number>([]);
    expect(empty.has('__proto__')).toBe(false);
    expect(empty.get('constructor')).toBeUndefined();

    const map = TypedMap.fromEntries([
      ['__proto__', 1],
      ['constructor', 2],
    ]);

    expect(map.get('__proto__')).toBe(1);
    expect(map.get('constructor')).toBe(2);
  });

  it('is not affected by later changes to the source entries', () => {
    const entries: [string, number][] = [['a', 1]];
    const map = TypedMap.fromEntries(entries);

    entries.push(['b', 2]);

    expect(map.has('b')).toBe(false);
    expect(map.size).toBe(1);
  });

  it('has size equal to the number of unique keys', () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(fc.string(), fc.integer())), (entries) => {
        const map = TypedMap.fromEntries(entries);
        expect(map.size).toBe(new Set(entries.map(([key]) => key)).size);
      })
    );
  });
});
