import type { ListEntriesOptions, SortOrder } from '../types';

export const DEFAULT_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 10;
export const MAX_PAGE_SIZE = 100;

export interface RawListOptions {
  page?: number;
  pageSize?: number;
  sortBy?: string;
  filterDate?: Date;
}

export function parseSortOrder(value?: string): SortOrder {
  switch (value?.trim().toLowerCase()) {
    case 'asc':
    case 'ascending':
      return 'asc';
    default:
      return 'desc';
  }
}

/**
 * Out-of-range paging values fall back to their defaults rather than failing the request.
 */
export function normalizeListOptions(raw: RawListOptions = {}): ListEntriesOptions {
  const page = raw.page !== undefined && Number.isSafeInteger(raw.page) && raw.page >= 1 ? raw.page : DEFAULT_PAGE;
  const pageSize =
    raw.pageSize !== undefined && Number.isInteger(raw.pageSize) && raw.pageSize >= 1 && raw.pageSize <= MAX_PAGE_SIZE
      ? raw.pageSize
      : DEFAULT_PAGE_SIZE;
  const filterDate = raw.filterDate && !Number.isNaN(raw.filterDate.getTime()) ? raw.filterDate : undefined;

  return { page, pageSize, sortBy: parseSortOrder(raw.sortBy), ...(filterDate && { filterDate }) };
}

/** `yyyy-MM-dd` of the instant in UTC */
export function toUtcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return firstString(value[0]);
  return undefined;
}

function parseNumber(value: unknown): number | undefined {
  const raw = firstString(value)?.trim();
  if (!raw) return undefined;
  const parsed = Number(raw);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseDate(value: unknown): Date | undefined {
  const raw = firstString(value)?.trim();
  if (!raw) return undefined;
  const parsed = new Date(raw);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/**
 * Reads `page`, `pageSize`, `sortBy` and `filterDate` from a query string.
 * Anything unreadable is dropped and left to the defaults.
 */
export function parseListEntriesQuery(query: Record<string, unknown>): ListEntriesOptions {
  return normalizeListOptions({
    page: parseNumber(query.page),
    pageSize: parseNumber(query.pageSize),
    sortBy: firstString(query.sortBy),
    filterDate: parseDate(query.filterDate),
  });
}
