/**
 * Page combinator: chains page fetches into one lazy sequence
 */

import { PageFetchError } from "./errors.js";
import type { CallOptions, Page, PageFetch, PageItem, TimeRange } from "./types.js";
import { validatePageArgs } from "./validation.js";

/**
 * Read a whole range through repeated calls to `fetch`
 *
 * The first page is fetched eagerly; a failure there rejects. When the range
 * fits in one page its sequence is returned as is. Otherwise later pages are
 * fetched only as the consumer pulls past the end of the current one, so
 * breaking out of the loop stops all fetching. A failed later fetch is
 * yielded as a single `ok: false` item that ends the sequence; items already
 * yielded stay valid.
 *
 * Works with either store strategy:
 *
 * @example
 * ```typescript
 * const items = await paginate(store.fetchPageConsistent, { from, to }, 0, 100);
 * for await (const item of items) {
 *   if (!item.ok) throw item.error;
 *   handle(item.value);
 * }
 * ```
 *
 * @throws {InvalidOptionsError} If offset is negative or limit is not positive
 * @throws {PageFetchError} If the first page cannot be fetched
 */
export async function paginate(
  fetch: PageFetch,
  range: TimeRange,
  offset: number,
  limit: number,
  options: CallOptions = {}
): Promise<AsyncIterable<PageItem>> {
  validatePageArgs(offset, limit);

  let first: Page;
  try {
    first = await fetch(range, offset, limit, options);
  } catch (err) {
    throw new PageFetchError("fetching first page failed", offset, { cause: err });
  }

  if (first.total <= limit) {
    return first.items;
  }

  return follow(fetch, range, first, offset, limit, options);
}

async function* follow(
  fetch: PageFetch,
  range: TimeRange,
  first: Page,
  offset: number,
  limit: number,
  options: CallOptions
): AsyncGenerator<PageItem, void, undefined> {
  let page = first;

  for (;;) {
    for await (const item of page.items) {
      yield item;
      if (!item.ok) {
        return;
      }
    }

    offset += limit;
    if (offset >= page.total) {
      return;
    }

    try {
      page = await fetch(range, offset, limit, options);
    } catch (err) {
      yield {
        ok: false,
        error: new PageFetchError("fetching next page failed", offset, { cause: err }),
      };
      return;
    }
  }
}
