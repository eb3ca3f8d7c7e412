import type { Paginated } from '../types';

export type PageRequest = { page: number; perPage: number; skip: number; take: number };

export type PaginationLimits = { itemsPerPage: number; maxItemsPerPage: number };

function toInt(value: unknown): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isInteger(n) ? n : undefined;
}

/** Reads `page` / `perPage` from a query string, clamped to 1..max. */
export function pageRequest(query: Record<string, unknown>, limits: PaginationLimits): PageRequest {
  const page = Math.max(1, toInt(query.page) ?? 1);
  const perPage = Math.min(Math.max(1, toInt(query.perPage) ?? limits.itemsPerPage), limits.maxItemsPerPage);
  return { page, perPage, skip: (page - 1) * perPage, take: perPage };
}

export function toPage<T>(items: T[], total: number, req: PageRequest): Paginated<T> {
  return {
    items,
    total,
    pages: Math.ceil(total / req.perPage),
    page: req.page,
    perPage: req.perPage,
  };
}

/** Pages an in-memory list, for feeds filtered or ordered outside the database. */
export function slicePage<T>(all: T[], req: PageRequest): Paginated<T> {
  return toPage(all.slice(req.skip, req.skip + req.take), all.length, req);
}
