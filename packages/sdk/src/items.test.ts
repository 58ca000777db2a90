import { describe, it, expect } from "vitest";
import { collectValues, itemsOf, noItems, ownedCopy } from "./items.js";
import type { PageItem } from "./types.js";

async function* failingAfterOne(): AsyncGenerator<PageItem> {
  yield { ok: true, value: Buffer.from("one") };
  yield { ok: false, error: new Error("lost connection") };
  yield { ok: true, value: Buffer.from("never") };
}

describe("items", () => {
  it("should yield values in order, nulls included", async () => {
    const seen: Array<Uint8Array | null> = [];
    for await (const item of itemsOf([Buffer.from("a"), null])) {
      if (item.ok) seen.push(item.value);
    }

    expect(seen).toEqual([Buffer.from("a"), null]);
  });

  it("should yield nothing for an empty page", async () => {
    expect(await collectValues(noItems())).toEqual([]);
  });

  it("should copy payloads so the source can change", async () => {
    const source = Buffer.from("abc");
    const copy = ownedCopy(source);
    source.fill(0);

    expect(Buffer.from(copy).toString()).toBe("abc");
    expect(ownedCopy(null)).toBeNull();
  });

  it("should collect owned values", async () => {
    const source = Buffer.from("xyz");
    const values = await collectValues(itemsOf([source]));
    source.fill(0);

    expect(values.map((v) => (v === null ? null : Buffer.from(v).toString()))).toEqual(["xyz"]);
  });

  it("should throw the first error item", async () => {
    await expect(collectValues(failingAfterOne())).rejects.toThrow("lost connection");
  });
});
