/**
 * Cursor-driven pagination over the API's `page[offset]` / `page[limit]`
 * parameters.
 *
 * A sequence ends when the API reports no further offset: no pagination
 * block, no `next`, `offset == last`, or an empty page. A `next` that does
 * not move past the current offset is treated the same way (with a
 * warning), and MAX_PAGES bounds the loop regardless.
 */

import type { TSchema, Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Logger } from "pino";
import { throwIfAborted } from "../errors.js";
import type { Pagination } from "./schemas.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Largest page the API accepts */
export const PAGE_LIMIT = 100;

export const MAX_PAGES = 10_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PageCursor {
  readonly offset: number;
  readonly limit: number;
}

export interface Page<T> {
  items: T[];
  /** null at end of sequence */
  next: PageCursor | null;
}

export interface PaginateOptions {
  signal?: AbortSignal;
  logger: Logger;
  maxPages?: number;
}

export interface PaginationTotals {
  pages: number;
  items: number;
}

// ---------------------------------------------------------------------------
// Cursor
// ---------------------------------------------------------------------------

export function firstCursor(limit: number = PAGE_LIMIT): PageCursor {
  return { offset: 0, limit };
}

/**
 * Work out the cursor after `cursor` from the page's pagination block.
 * `itemCount` is the raw number of items the page carried.
 */
export function nextCursor(
  cursor: PageCursor,
  pagination: Pagination | undefined,
  itemCount: number,
  logger: Logger,
): PageCursor | null {
  if (itemCount === 0 || !pagination) return null;

  const { offset, next, last } = pagination;
  if (offset != null && offset === last) return null;
  if (next == null) return null;

  if (next <= cursor.offset) {
    logger.warn(
      { offset: cursor.offset, next, last },
      "pagination cursor did not advance; ending sequence",
    );
    return null;
  }
  return { offset: next, limit: cursor.limit };
}

// ---------------------------------------------------------------------------
// Driver
// ---------------------------------------------------------------------------

/**
 * Fetch pages in cursor order until the sequence ends, handing each to
 * `onPage`. Pages are fetched strictly one after another.
 */
export async function paginate<T>(
  fetchPage: (cursor: PageCursor) => Promise<Page<T>>,
  onPage: (page: Page<T>, cursor: PageCursor) => void,
  options: PaginateOptions,
): Promise<PaginationTotals> {
  const maxPages = options.maxPages ?? MAX_PAGES;
  const totals: PaginationTotals = { pages: 0, items: 0 };
  let cursor: PageCursor | null = firstCursor();

  while (cursor) {
    throwIfAborted(options.signal, "pagination");
    if (totals.pages >= maxPages) {
      options.logger.warn(
        { pages: totals.pages, offset: cursor.offset },
        "page limit reached; ending sequence",
      );
      break;
    }

    const page = await fetchPage(cursor);
    totals.pages++;
    totals.items += page.items.length;
    onPage(page, cursor);
    cursor = page.next;
  }

  throwIfAborted(options.signal, "pagination");
  return totals;
}

// ---------------------------------------------------------------------------
// Item decoding
// ---------------------------------------------------------------------------

/** Keep the items matching `schema`; log and skip the rest */
export function decodeItems<S extends TSchema>(
  schema: S,
  raw: unknown[],
  logger: Logger,
  kind: string,
): Static<S>[] {
  const items: Static<S>[] = [];
  raw.forEach((item, index) => {
    if (Value.Check(schema, item)) {
      items.push(item);
      return;
    }
    const first = Value.Errors(schema, item).First();
    logger.warn(
      { kind, index, path: first?.path, reason: first?.message },
      "skipping malformed item",
    );
  });
  return items;
}
