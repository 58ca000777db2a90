/**
 * Helpers for draining page sequences in tests
 */

import type { PageItem } from "@timekv/sdk";

/**
 * Everything a sequence produced, values decoded as UTF-8
 */
export interface Drained {
  values: Array<string | null>;
  errors: Error[];
}

/**
 * Drain a sequence, keeping values and error items apart
 */
export async function drain(items: AsyncIterable<PageItem>): Promise<Drained> {
  const drained: Drained = { values: [], errors: [] };
  for await (const item of items) {
    if (item.ok) {
      drained.values.push(item.value === null ? null : Buffer.from(item.value).toString("utf8"));
    } else {
      drained.errors.push(item.error);
    }
  }
  return drained;
}

/**
 * Pull at most `count` values, then stop consuming
 */
export async function take(items: AsyncIterable<PageItem>, count: number): Promise<string[]> {
  const values: string[] = [];
  if (count <= 0) return values;

  for await (const item of items) {
    if (!item.ok) throw item.error;
    values.push(item.value === null ? "" : Buffer.from(item.value).toString("utf8"));
    if (values.length >= count) break;
  }
  return values;
}
