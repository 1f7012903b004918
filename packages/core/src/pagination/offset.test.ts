import { describe, it, expect, vi } from "vitest";
import { paginateOffset, type OffsetPageRequest } from "./offset.js";

function backend(total: number) {
  return vi.fn(async ({ limit, offset }: OffsetPageRequest) => {
    const items: string[] = [];
    for (let i = offset; i < Math.min(offset + limit, total); i++) {
      items.push(`item-${i}`);
    }
    return items;
  });
}

describe("paginateOffset", () => {
  it("defaults to offset 0, a page size of 50 and forward order", async () => {
    const fetchFn = backend(123);
    const items = await paginateOffset(fetchFn).collectAll();

    expect(items).toHaveLength(123);
    expect(items[50]).toBe("item-50");
    expect(fetchFn.mock.calls.map(([request]) => request)).toEqual([
      { limit: 50, offset: 0, reverse: false },
      { limit: 50, offset: 50, reverse: false },
      { limit: 50, offset: 100, reverse: false },
    ]);
  });

  it("starts from the given offset and forwards reverse", async () => {
    const fetchFn = backend(25);
    const paginator = paginateOffset(fetchFn, { limit: 10, offset: 5, reverse: true });

    await expect(paginator.take(3)).resolves.toEqual(["item-5", "item-6", "item-7"]);
    expect(paginator.currentCursor()).toBe(15);
    expect(fetchFn).toHaveBeenCalledWith({ limit: 10, offset: 5, reverse: true });
  });

  it("advances by the number of items actually returned", async () => {
    const fetchFn = vi
      .fn(async (_request: OffsetPageRequest): Promise<string[]> => [])
      .mockResolvedValueOnce(["a", "b", "c"]);
    const paginator = paginateOffset(fetchFn, { limit: 3 });

    await paginator.collectAll();
    expect(fetchFn.mock.calls.map(([request]) => request.offset)).toEqual([0, 3]);
  });
});
