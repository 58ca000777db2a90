/**
 * Helpers for page item sequences
 */

import type { PageItem } from "./types.js";

/**
 * Lazy sequence over values that are already in memory
 */
export async function* itemsOf(
  values: ReadonlyArray<Uint8Array | null>
): AsyncGenerator<PageItem, void, undefined> {
  for (const value of values) {
    yield { ok: true, value };
  }
}

/**
 * An empty page sequence
 */
export function noItems(): AsyncIterable<PageItem> {
  return itemsOf([]);
}

/**
 * Copy a borrowed payload view so it can be kept past the current step
 */
export function ownedCopy(view: Uint8Array): Uint8Array;
export function ownedCopy(view: Uint8Array | null): Uint8Array | null;
export function ownedCopy(view: Uint8Array | null): Uint8Array | null {
  return view === null ? null : Uint8Array.from(view);
}

/**
 * Drain a sequence into owned copies of its values
 * @throws The error of the first `ok: false` item
 */
export async function collectValues(
  items: AsyncIterable<PageItem>
): Promise<Array<Uint8Array | null>> {
  const values: Array<Uint8Array | null> = [];
  for await (const item of items) {
    if (!item.ok) {
      throw item.error;
    }
    values.push(ownedCopy(item.value));
  }
  return values;
}
