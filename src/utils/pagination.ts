import { z } from 'zod';

export interface PaginationParams {
  offset: number;
  limit: number;
  page: number;
}

/** `?page=&limit=`, page from 1, limit 1-100 (default 24). */
export const paginationSchema = z.object({
  page: z.coerce.number().int().min(1).catch(1),
  limit: z.coerce.number().int().min(1).max(100).catch(24),
});

export function toPagination(query: { page: number; limit: number }): PaginationParams {
  return { page: query.page, limit: query.limit, offset: (query.page - 1) * query.limit };
}
