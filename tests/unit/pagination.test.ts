import { describe, it, expect } from 'vitest';
import { emptyPage, pageRange, toPagedResult, totalPages } from '../../src/utils/pagination';

describe('pagination', () => {
  it('computes total pages by rounding up', () => {
    expect(totalPages(0, 10)).toBe(0);
    expect(totalPages(10, 10)).toBe(1);
    expect(totalPages(11, 10)).toBe(2);
  });

  it('maps a 1-based page to an inclusive row range', () => {
    expect(pageRange({ pageNumber: 1, pageSize: 10 })).toEqual({ from: 0, to: 9 });
    expect(pageRange({ pageNumber: 3, pageSize: 5 })).toEqual({ from: 10, to: 14 });
  });

  it('wraps items with page metadata', () => {
    expect(toPagedResult(['a', 'b'], 12, { pageNumber: 2, pageSize: 10 })).toEqual({
      items: ['a', 'b'],
      pageNumber: 2,
      pageSize: 10,
      totalCount: 12,
      totalPages: 2,
    });
  });

  it('builds an empty page', () => {
    expect(emptyPage({ pageNumber: 1, pageSize: 20 })).toEqual({
      items: [],
      pageNumber: 1,
      pageSize: 20,
      totalCount: 0,
      totalPages: 0,
    });
  });
});
