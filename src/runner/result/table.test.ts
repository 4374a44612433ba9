import { describe, expect, it } from 'vitest';

import { normalizeResult } from '@/runner/result/table';

describe('normalizeResult', () => {
  it('passes non-table values through', () => {
    expect(normalizeResult('k', 3)).toBe(3);
    expect(normalizeResult('k', { columns: ['a'] })).toEqual({ columns: ['a'] });
  });

  it('stringifies cells and maps null to an empty string', () => {
    expect(
      normalizeResult('k', { columns: ['a', 'b', 'c'], data: [[1.5, true, null]] }),
    ).toEqual({ columns: ['a', 'b', 'c'], data: [['1.5', 'true', '']] });
  });

  it('stores the error message of a failed table', () => {
    expect(
      normalizeResult('k', { columns: [], data: [], error: 'no rows for filter' }),
    ).toBe('no rows for filter');
  });

  it('keeps a null error as a normal table', () => {
    expect(normalizeResult('k', { columns: ['a'], data: [], error: null })).toEqual({
      columns: ['a'],
      data: [],
    });
  });

  it('keeps the raw value when the shape does not fit', () => {
    const raw = { columns: 'a', data: [[1]] };
    expect(normalizeResult('k', raw)).toEqual(raw);
  });
});
