import type { PaginationOptions } from "../schemas/sms.js";
import { DEFAULT_PAGE_SIZE, Paginator } from "./paginator.js";

export interface OffsetPageRequest {
  limit: number;
  offset: number;
  reverse: boolean;
}

export type FetchFn<T> = (request: OffsetPageRequest) => Promise<T[]>;

/**
 * Paginate a limit/offset endpoint. The offset advances by the number of
 * items each page actually returned.
 */
export function paginateOffset<T>(
  fetchFn: FetchFn<T>,
  options: PaginationOptions = {},
): Paginator<T, number> {
  const reverse = options.reverse ?? false;

  return new Paginator<T, number>(
    async (offset, limit) => ({ items: await fetchFn({ limit, offset, reverse }) }),
    {
      initialCursor: options.offset ?? 0,
      pageSize: options.limit ?? DEFAULT_PAGE_SIZE,
      advance: (offset, received) => offset + received,
    },
  );
}
