// Domain: Pagination
// Page requests and page responses shared by every listing query

export interface PageRequest {
  page: number;   // zero-based
  size: number;
}

export interface PageResponse<T> {
  content: T[];
  number: number;
  size: number;
  totalElements: number;
  totalPages: number;
  first: boolean;
  last: boolean;
}

export const DEFAULT_PAGE_SIZE = 10;

/**
 * Slice an already-sorted list into the requested page
 */
export function paginate<T>(items: T[], request: PageRequest): PageResponse<T> {
  const { page, size } = request;
  const totalElements = items.length;
  const totalPages = size > 0 ? Math.ceil(totalElements / size) : 0;
  const start = page * size;

  return {
    content: items.slice(start, start + size),
    number: page,
    size,
    totalElements,
    totalPages,
    first: page === 0,
    last: page + 1 >= totalPages,
  };
}

export function mapPage<T, U>(page: PageResponse<T>, mapper: (item: T) => U): PageResponse<U> {
  return { ...page, content: page.content.map(mapper) };
}

/**
 * Newest first. Rows created in the same millisecond keep reverse insertion order.
 */
export function sortByCreatedDesc<T extends { createdAt: Date }>(rows: T[]): T[] {
  return [...rows].reverse().sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
}
