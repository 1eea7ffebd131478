import type { PageQuery, Paginated } from '../types/jobs';

/** A `pageSize` of zero returns every item on a single page. */
export function paginate<T>(items: readonly T[], { page, pageSize }: PageQuery): Paginated<T> {
  const total = items.length;
  if (pageSize <= 0) {
    return { items: [...items], total, page: 1, pageSize: 0, totalPages: 1 };
  }

  const totalPages = Math.max(1, Math.ceil(total / pageSize));
  const start = (Math.max(1, page) - 1) * pageSize;
  return {
    items: items.slice(start, start + pageSize),
    total,
    page: Math.max(1, page),
    pageSize,
    totalPages,
  };
}
