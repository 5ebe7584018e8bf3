import { PagedResult, PaginationParams } from '../types/api.types';

export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export function totalPages(totalCount: number, pageSize: number): number {
  return Math.ceil(totalCount / pageSize);
}

// Zero-based inclusive row range for a 1-based page
export function pageRange({ pageNumber, pageSize }: PaginationParams): { from: number; to: number } {
  const from = (pageNumber - 1) * pageSize;
  return { from, to: from + pageSize - 1 };
}

export function toPagedResult<T>(
  items: T[],
  totalCount: number,
  params: PaginationParams
): PagedResult<T> {
  return {
    items,
    pageNumber: params.pageNumber,
    pageSize: params.pageSize,
    totalCount,
    totalPages: totalPages(totalCount, params.pageSize),
  };
}

export function emptyPage<T>(params: PaginationParams): PagedResult<T> {
  return toPagedResult<T>([], 0, params);
}
