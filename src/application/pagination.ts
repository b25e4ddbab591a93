export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PageParams {
  page?: number;
  limit?: number;
}

export interface ResolvedPage {
  page: number;
  limit: number;
  offset: number;
}

/**
 * Clamps `limit` to [1, 100] (default 20) and `page` to >= 1 (default 1),
 * and derives the row offset.
 */
export function resolvePage(params: PageParams): ResolvedPage {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
  const page = Math.max(params.page ?? 1, 1);
  return { page, limit, offset: (page - 1) * limit };
}
