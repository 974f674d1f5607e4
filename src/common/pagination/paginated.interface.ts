export type SortOrder = 'asc' | 'desc';

export interface Paginated<T> {
  data: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

export const MAX_PAGE_SIZE = 100;

export function clampPage(page?: number, limit?: number): { page: number; limit: number; skip: number } {
  const p = Math.max(1, page ?? 1);
  const l = Math.min(MAX_PAGE_SIZE, Math.max(1, limit ?? 20));
  return { page: p, limit: l, skip: (p - 1) * l };
}

export function toPaginated<T>(data: T[], total: number, page: number, limit: number): Paginated<T> {
  return { data, total, page, limit, totalPages: Math.ceil(total / limit) };
}
