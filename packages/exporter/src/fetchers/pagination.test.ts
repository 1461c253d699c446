import { describe, it, expect, vi } from "vitest";
import { Type } from "@sinclair/typebox";
import {
  PAGE_LIMIT,
  decodeItems,
  firstCursor,
  nextCursor,
  paginate,
  type Page,
  type PageCursor,
} from "./pagination.js";
import { CancelledError } from "../errors.js";
import { createMockLogger } from "../test/mock-logger.js";

// ---------------------------------------------------------------------------
// nextCursor
// ---------------------------------------------------------------------------

describe("nextCursor", () => {
  const { logger, asLogger } = createMockLogger();
  const cursor: PageCursor = { offset: 100, limit: PAGE_LIMIT };

  it("advances to the reported next offset", () => {
    expect(nextCursor(cursor, { offset: 100, next: 200, last: 300 }, 100, asLogger)).toEqual({
      offset: 200,
      limit: 100,
    });
  });

  it("ends when offset equals last", () => {
    expect(nextCursor(cursor, { offset: 100, next: 200, last: 100 }, 100, asLogger)).toBeNull();
  });

  it("ends without a pagination block or next offset", () => {
    expect(nextCursor(cursor, undefined, 100, asLogger)).toBeNull();
    expect(nextCursor(cursor, { offset: 100 }, 100, asLogger)).toBeNull();
  });

  it("reads null cursor fields as absent", () => {
    expect(nextCursor(cursor, { offset: 100, next: null, last: 300 }, 100, asLogger)).toBeNull();
    expect(nextCursor(cursor, { offset: null, next: 200, last: null }, 100, asLogger)).toEqual({
      offset: 200,
      limit: cursor.limit,
    });
  });

  it("ends on an empty page", () => {
    expect(nextCursor(cursor, { offset: 100, next: 200, last: 300 }, 0, asLogger)).toBeNull();
  });

  it("ends with a warning when the cursor does not advance", () => {
    logger.warn.mockClear();
    expect(nextCursor(cursor, { offset: 100, next: 100, last: 300 }, 100, asLogger)).toBeNull();
    expect(nextCursor(cursor, { offset: 100, next: 0, last: 300 }, 100, asLogger)).toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});

// ---------------------------------------------------------------------------
// paginate
// ---------------------------------------------------------------------------

describe("paginate", () => {
  const { asLogger } = createMockLogger();

  it("visits every page once, in cursor order", async () => {
    const pages: Record<number, Page<string>> = {
      0: { items: ["a", "b"], next: { offset: 2, limit: PAGE_LIMIT } },
      2: { items: ["c"], next: { offset: 3, limit: PAGE_LIMIT } },
      3: { items: ["d"], next: null },
    };
    const fetchPage = vi.fn(async (cursor: PageCursor) => pages[cursor.offset]);
    const seen: string[] = [];

    const totals = await paginate(fetchPage, (page) => seen.push(...page.items), {
      logger: asLogger,
    });

    expect(fetchPage.mock.calls.map(([c]) => c.offset)).toEqual([0, 2, 3]);
    expect(seen).toEqual(["a", "b", "c", "d"]);
    expect(totals).toEqual({ pages: 3, items: 4 });
  });

  it("stops at maxPages even if the cursor keeps advancing", async () => {
    const fetchPage = vi.fn(async (cursor: PageCursor) => ({
      items: [cursor.offset],
      next: { offset: cursor.offset + 1, limit: 1 },
    }));

    const totals = await paginate(fetchPage, () => {}, { logger: asLogger, maxPages: 5 });

    expect(fetchPage).toHaveBeenCalledTimes(5);
    expect(totals.pages).toBe(5);
  });

  it("rejects with CancelledError when the signal fires between pages", async () => {
    const ac = new AbortController();
    const fetchPage = vi.fn(async (cursor: PageCursor) => {
      ac.abort();
      return { items: [1], next: { offset: cursor.offset + 1, limit: 1 } };
    });

    await expect(
      paginate(fetchPage, () => {}, { logger: asLogger, signal: ac.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetchPage).toHaveBeenCalledOnce();
  });

  it("starts from offset zero with the full page size", () => {
    expect(firstCursor()).toEqual({ offset: 0, limit: 100 });
  });
});

// ---------------------------------------------------------------------------
// decodeItems
// ---------------------------------------------------------------------------

describe("decodeItems", () => {
  it("keeps valid items and skips the rest with a warning", () => {
    const { logger, asLogger } = createMockLogger();
    const schema = Type.Object({ id: Type.Integer() });

    const items = decodeItems(schema, [{ id: 1 }, { id: "two" }, null, { id: 3 }], asLogger, "thing");

    expect(items).toEqual([{ id: 1 }, { id: 3 }]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ kind: "thing", index: 1 }),
      "skipping malformed item",
    );
  });
});
