import { describe, it, expect, vi } from "vitest";
import { PaginationFetchError } from "../errors/catalog.js";
import { Paginator, type Page } from "./paginator.js";

/** Backend holding `total` numbered items, served by offset. */
function offsetBackend(total: number) {
  const fetchPage = vi.fn(
    async (offset: number, pageSize: number): Promise<Page<number, number>> => {
      const end = Math.min(offset + pageSize, total);
      const items: number[] = [];
      for (let i = offset; i < end; i++) items.push(i);
      return { items, nextCursor: offset + items.length };
    },
  );
  return fetchPage;
}

async function drain<T, C>(paginator: Paginator<T, C>): Promise<T[]> {
  const items: T[] = [];
  for (;;) {
    const next = await paginator.nextItem();
    if (next.done) return items;
    items.push(next.value);
  }
}

describe("Paginator", () => {
  it("streams every item across pages and stops at a short page", async () => {
    const fetchPage = offsetBackend(123);
    const paginator = new Paginator(fetchPage, { initialCursor: 0 });

    const items = await drain(paginator);

    expect(items).toHaveLength(123);
    expect(items[0]).toBe(0);
    expect(items[122]).toBe(122);
    expect(fetchPage.mock.calls).toEqual([
      [0, 50],
      [50, 50],
      [100, 50],
    ]);
  });

  it("keeps returning the end sentinel once exhausted", async () => {
    const fetchPage = offsetBackend(3);
    const paginator = new Paginator(fetchPage, { initialCursor: 0, pageSize: 5 });

    await drain(paginator);
    await expect(paginator.nextItem()).resolves.toEqual({ done: true });
    await expect(paginator.nextItem()).resolves.toEqual({ done: true });
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("needs one extra empty fetch after an exactly full final page", async () => {
    const fetchPage = offsetBackend(10);
    const paginator = new Paginator(fetchPage, { initialCursor: 0, pageSize: 5 });

    await expect(paginator.take(10)).resolves.toHaveLength(10);
    expect(paginator.hasMore()).toBe(true);
    await expect(paginator.nextItem()).resolves.toEqual({ done: true });
    expect(fetchPage.mock.calls).toEqual([
      [0, 5],
      [5, 5],
      [10, 5],
    ]);
    expect(paginator.hasMore()).toBe(false);
  });

  it("ends early when a page reports hasMore false", async () => {
    const fetchPage = vi.fn(async () => ({
      items: ["a", "b"],
      nextCursor: "next",
      hasMore: false,
    }));
    const paginator = new Paginator(fetchPage, { initialCursor: "start", pageSize: 2 });

    await expect(paginator.collectAll()).resolves.toEqual(["a", "b"]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it("ends when a page carries no next cursor", async () => {
    const fetchPage = vi.fn(async (): Promise<Page<string, string>> => ({
      items: ["a", "b"],
    }));
    const paginator = new Paginator(fetchPage, { initialCursor: "start", pageSize: 2 });

    await expect(paginator.collectAll()).resolves.toEqual(["a", "b"]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
    expect(paginator.currentCursor()).toBe("start");
  });

  it("follows opaque cursors", async () => {
    const pages: Record<string, Page<string, string>> = {
      start: { items: ["a", "b"], nextCursor: "p2" },
      p2: { items: ["c", "d"], nextCursor: "p3" },
      p3: { items: ["e"] },
    };
    const fetchPage = vi.fn(async (cursor: string) => pages[cursor]);
    const paginator = new Paginator(fetchPage, { initialCursor: "start", pageSize: 2 });

    await expect(paginator.collectAll()).resolves.toEqual(["a", "b", "c", "d", "e"]);
    expect(fetchPage.mock.calls.map(([cursor]) => cursor)).toEqual([
      "start",
      "p2",
      "p3",
    ]);
  });

  it("preserves state after a failed fetch and retries the same page", async () => {
    const backend = offsetBackend(60);
    const fetchPage = vi
      .fn(backend)
      .mockImplementationOnce(backend)
      .mockRejectedValueOnce(new Error("gateway timeout"));
    const paginator = new Paginator(fetchPage, { initialCursor: 0 });

    const first = await paginator.take(50);
    expect(first).toHaveLength(50);

    const error = await paginator.nextItem().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PaginationFetchError);
    expect(error).toMatchObject({ message: "Failed to fetch page at cursor 50" });
    expect(error instanceof Error && error.cause).toEqual(new Error("gateway timeout"));
    expect(paginator.currentCursor()).toBe(50);

    await expect(paginator.nextItem()).resolves.toEqual({ done: false, value: 50 });
    expect(fetchPage.mock.calls.map(([cursor]) => cursor)).toEqual([0, 50, 50]);
  });

  it("hands out a large page in order", async () => {
    const fetchPage = offsetBackend(20_000);
    const paginator = new Paginator(fetchPage, { initialCursor: 0, pageSize: 10_000 });

    const items = await drain(paginator);

    expect(items).toHaveLength(20_000);
    expect(items.every((item, index) => item === index)).toBe(true);
    expect(fetchPage.mock.calls).toEqual([
      [0, 10_000],
      [10_000, 10_000],
      [20_000, 10_000],
    ]);
  });

  it("keeps its own copy of a fetched page", async () => {
    const page = ["a", "b", "c"];
    const paginator = new Paginator(async () => ({ items: page }), {
      initialCursor: 0,
      pageSize: 5,
    });

    await expect(paginator.nextItem()).resolves.toEqual({ done: false, value: "a" });
    page.length = 0;

    await expect(paginator.collectAll()).resolves.toEqual(["b", "c"]);
  });

  it("returns the end sentinel for an empty result set", async () => {
    const paginator = new Paginator(offsetBackend(0), { initialCursor: 0 });
    await expect(paginator.nextItem()).resolves.toEqual({ done: true });
    expect(paginator.hasMore()).toBe(false);
  });

  it("rejects a non-positive page size", () => {
    expect(() => new Paginator(offsetBackend(1), { initialCursor: 0, pageSize: 0 })).toThrow(
      "pageSize must be a positive integer, got 0",
    );
    expect(() => new Paginator(offsetBackend(1), { initialCursor: 0, pageSize: 2.5 })).toThrow(
      RangeError,
    );
  });

  it("refuses concurrent fetches", async () => {
    let release: () => void = () => {};
    const fetchPage = vi.fn(
      () =>
        new Promise<Page<number, number>>((resolve) => {
          release = () => resolve({ items: [1] });
        }),
    );
    const paginator = new Paginator(fetchPage, { initialCursor: 0 });

    const first = paginator.nextItem();
    await expect(paginator.nextItem()).rejects.toThrow(
      "Paginator does not support concurrent nextItem() calls",
    );
    release();
    await expect(first).resolves.toEqual({ done: false, value: 1 });
  });

  describe("helpers", () => {
    it("iterates with for await", async () => {
      const paginator = new Paginator(offsetBackend(7), { initialCursor: 0, pageSize: 3 });
      const items: number[] = [];
      for await (const item of paginator) items.push(item);
      expect(items).toEqual([0, 1, 2, 3, 4, 5, 6]);
    });

    it("take stops at the end of the sequence", async () => {
      const paginator = new Paginator(offsetBackend(4), { initialCursor: 0, pageSize: 3 });
      await expect(paginator.take(2)).resolves.toEqual([0, 1]);
      await expect(paginator.take(10)).resolves.toEqual([2, 3]);
    });

    it("skip discards items and chains", async () => {
      const paginator = new Paginator(offsetBackend(6), { initialCursor: 0, pageSize: 4 });
      const rest = await (await paginator.skip(3)).collectAll();
      expect(rest).toEqual([3, 4, 5]);
    });

    it("forEachChunk hands out fixed-size chunks and a short tail", async () => {
      const paginator = new Paginator(offsetBackend(7), { initialCursor: 0, pageSize: 5 });
      const chunks: number[][] = [];
      await paginator.forEachChunk(3, (chunk) => {
        chunks.push(chunk);
      });
      expect(chunks).toEqual([[0, 1, 2], [3, 4, 5], [6]]);
    });

    it("forEachChunk propagates a chunk handler failure", async () => {
      const paginator = new Paginator(offsetBackend(4), { initialCursor: 0, pageSize: 5 });
      await expect(
        paginator.forEachChunk(2, async () => {
          throw new Error("sink full");
        }),
      ).rejects.toThrow("sink full");
    });
  });
});
