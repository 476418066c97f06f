import { describe, expect, it } from 'vitest';

import { filterByDate, latestUpdatedDate } from './select.js';
import type { PaperRecord } from './types.js';

function paper(id: string, updated: string | null): PaperRecord {
  return { id, title: id, summary: null, published: null, updated, authors: [], pdf_url: null };
}

describe('latestUpdatedDate', () => {
  it('picks the maximum date across all records, not the first one', () => {
    const records = [
      paper('a', '2024-01-01T10:00:00Z'),
      paper('b', '2024-01-02T09:00:00Z'),
      paper('c', '2024-01-02T11:00:00Z'),
    ];
    expect(latestUpdatedDate(records)).toBe('2024-01-02');
  });

  it('ignores records without an updated value', () => {
    expect(latestUpdatedDate([paper('a', null), paper('b', '2023-12-31T23:59:59Z')])).toBe('2023-12-31');
  });

  it('returns null when no record is dated', () => {
    expect(latestUpdatedDate([])).toBeNull();
    expect(latestUpdatedDate([paper('a', null)])).toBeNull();
  });
});

describe('filterByDate', () => {
  it('keeps records whose updated value starts with the date', () => {
    const records = [
      paper('a', '2024-01-01T10:00:00Z'),
      paper('b', '2024-01-02T09:00:00Z'),
      paper('c', '2024-01-02T11:00:00Z'),
      paper('d', null),
    ];
    expect(filterByDate(records, '2024-01-02').map((p) => p.id)).toEqual(['b', 'c']);
  });

  it('accepts a bare date without a time suffix', () => {
    expect(filterByDate([paper('a', '2024-01-02')], '2024-01-02')).toHaveLength(1);
  });
});
