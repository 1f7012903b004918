export {
  Paginator,
  DEFAULT_PAGE_SIZE,
  type Page,
  type FetchPage,
  type PaginatorOptions,
  type NextItem,
} from "./paginator.js";
export { paginateOffset, type FetchFn, type OffsetPageRequest } from "./offset.js";
