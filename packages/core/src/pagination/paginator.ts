/**
 * Lazy cursor-based paginator.
 *
 * Pages are fetched on demand, one at a time, and handed out item by item.
 * A page shorter than the page size, a page flagged `hasMore: false`, or a
 * page without a way to compute the next cursor ends the sequence. A failed
 * fetch leaves cursor and buffer untouched, so calling nextItem() again
 * retries the same page.
 *
 * Instances are single-use and meant for one consumer at a time.
 */

import { PaginationFetchError } from "../errors/catalog.js";

export const DEFAULT_PAGE_SIZE = 50;

export interface Page<T, C> {
  items: T[];
  /** Cursor for the following page. Falls back to the paginator's advance(). */
  nextCursor?: C;
  /** Set to false to end the sequence even after a full page. */
  hasMore?: boolean;
}

export type FetchPage<T, C> = (cursor: C, pageSize: number) => Promise<Page<T, C>>;

export interface PaginatorOptions<C> {
  initialCursor: C;
  pageSize?: number;
  /** Derive the next cursor when a page does not carry one. */
  advance?: (cursor: C, received: number) => C;
}

export type NextItem<T> = { done: false; value: T } | { done: true };

export class Paginator<T, C = number> implements AsyncIterable<T> {
  private readonly pageSize: number;
  private readonly advance: ((cursor: C, received: number) => C) | undefined;
  private cursor: C;
  private buffer: T[] = [];
  /** Index of the next buffered item to hand out. */
  private position = 0;
  private exhausted = false;
  private fetching = false;

  constructor(
    private readonly fetchPage: FetchPage<T, C>,
    options: PaginatorOptions<C>,
  ) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
    }
    this.pageSize = pageSize;
    this.cursor = options.initialCursor;
    this.advance = options.advance;
  }

  /**
   * Next item, or `{ done: true }` once the sequence is over.
   * Rejects with PaginationFetchError when a page cannot be fetched.
   */
  async nextItem(): Promise<NextItem<T>> {
    if (this.buffered() === 0 && !this.exhausted) {
      await this.fetchNextPage();
    }
    if (this.buffered() === 0) {
      return { done: true };
    }
    const value = this.buffer[this.position];
    this.position++;
    return { done: false, value };
  }

  /** Whether another item may still be returned. */
  hasMore(): boolean {
    return this.buffered() > 0 || !this.exhausted;
  }

  /** Cursor the next fetch will use. */
  currentCursor(): C {
    return this.cursor;
  }

  async collectAll(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  /** Up to n further items. */
  async take(n: number): Promise<T[]> {
    const items: T[] = [];
    while (items.length < n) {
      const next = await this.nextItem();
      if (next.done) break;
      items.push(next.value);
    }
    return items;
  }

  /** Discard up to n items. Returns the paginator for chaining. */
  async skip(n: number): Promise<this> {
    for (let i = 0; i < n; i++) {
      const next = await this.nextItem();
      if (next.done) break;
    }
    return this;
  }

  /** Hand out the remaining items in chunks of chunkSize (the last may be shorter). */
  async forEachChunk(
    chunkSize: number,
    fn: (chunk: T[]) => void | Promise<void>,
  ): Promise<void> {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    let chunk: T[] = [];
    for await (const item of this) {
      chunk.push(item);
      if (chunk.length >= chunkSize) {
        await fn(chunk);
        chunk = [];
      }
    }
    if (chunk.length > 0) {
      await fn(chunk);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.nextItem();
      if (next.done) return;
      yield next.value;
    }
  }

  private async fetchNextPage(): Promise<void> {
    if (this.fetching) {
      throw new Error("Paginator does not support concurrent nextItem() calls");
    }
    this.fetching = true;

    let page: Page<T, C>;
    try {
      page = await this.fetchPage(this.cursor, this.pageSize);
    } catch (err) {
      throw new PaginationFetchError(this.cursor, { cause: err });
    } finally {
      this.fetching = false;
    }

    const { items } = page;
    let nextCursor = page.nextCursor;
    if (nextCursor === undefined && this.advance) {
      nextCursor = this.advance(this.cursor, items.length);
    }

    if (
      items.length < this.pageSize ||
      page.hasMore === false ||
      nextCursor === undefined
    ) {
      this.exhausted = true;
    }
    if (nextCursor !== undefined) {
      this.cursor = nextCursor;
    }
    this.buffer = [...items];
    this.position = 0;
  }

  private buffered(): number {
    return this.buffer.length - this.position;
  }
}
