/**
 * Deterministic page sources for combinator tests
 */

import { itemsOf, type Page, type PageFetch, type TimeRange } from "@timekv/sdk";

/**
 * One recorded page fetch
 */
export interface PageCall {
  range: TimeRange;
  offset: number;
  limit: number;
}

/**
 * A page fetch function together with the calls made to it
 */
export interface PageSource {
  fetch: PageFetch;
  calls: PageCall[];
}

/**
 * Page source over an in-memory list of payloads
 *
 * Reports `total` as the list length, and an empty page past the end.
 * `failAt` makes the fetch for those offsets reject.
 */
export function pageSource(
  payloads: readonly string[],
  options: { failAt?: readonly number[]; total?: number } = {}
): PageSource {
  const calls: PageCall[] = [];
  const values = payloads.map((p) => Buffer.from(p));

  const fetch: PageFetch = async (range, offset, limit) => {
    calls.push({ range, offset, limit });

    if (options.failAt?.includes(offset)) {
      throw new Error(`page at offset ${offset} unavailable`);
    }

    const page: Page = {
      items: itemsOf(values.slice(offset, offset + limit)),
      total: options.total ?? values.length,
    };
    return page;
  };

  return { fetch, calls };
}
