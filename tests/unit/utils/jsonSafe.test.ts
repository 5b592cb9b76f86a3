import { describe, it, expect } from 'vitest';
import { toJsonSafe } from '../../../src/utils/jsonSafe.js';

describe('toJsonSafe', () => {
  it('turns dates into ISO strings and invalid dates into null', () => {
    expect(toJsonSafe(new Date('2025-01-15T12:00:00.000Z'))).toBe('2025-01-15T12:00:00.000Z');
    expect(toJsonSafe(new Date('not a date'))).toBeNull();
  });

  it('replaces non-finite numbers and undefined with null', () => {
    expect(toJsonSafe({ a: NaN, b: Infinity, c: -Infinity, d: undefined, e: 1.5 })).toEqual({
      a: null,
      b: null,
      c: null,
      d: null,
      e: 1.5
    });
  });

  it('converts maps and sets recursively', () => {
    const value = new Map<string, unknown>([
      ['codes', new Set(['E1', 'E2'])],
      ['window', { start: new Date('2025-01-15T11:00:00.000Z'), values: [1, NaN] }]
    ]);

    expect(toJsonSafe(value)).toEqual({
      codes: ['E1', 'E2'],
      window: { start: '2025-01-15T11:00:00.000Z', values: [1, null] }
    });
  });

  it('drops functions and narrows bigints', () => {
    expect(toJsonSafe([() => 1, BigInt(42), 'text', false])).toEqual([null, 42, 'text', false]);
  });
});
