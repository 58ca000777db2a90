/**
 * Throughput of the two range strategies through the page combinator
 * Run with: npm run bench
 */

import { describe, it, expect, beforeAll } from "vitest";
import { createMemoryStore, sampleRecords, BASE_TIME, at, type MemoryStoreHandle } from "@timekv/testkit";

const RECORDS = 10_000;
const PAGE = 500;

describe("Range fetch benchmarks", () => {
  let handle: MemoryStoreHandle;

  beforeAll(async () => {
    handle = createMemoryStore({ namespace: "bench" });
    const records = sampleRecords(RECORDS, BASE_TIME);
    for (let i = 0; i < records.length; i += 1000) {
      await handle.store.bulkSet(records.slice(i, i + 1000));
    }
  });

  for (const consistent of [false, true]) {
    it(`paginates ${RECORDS} records, consistent=${consistent}`, { timeout: 30000 }, async () => {
      const start = Date.now();
      const items = await handle.store.paginate(
        { from: BASE_TIME, to: at(RECORDS) },
        0,
        PAGE,
        { consistent }
      );

      let count = 0;
      for await (const item of items) {
        expect(item.ok).toBe(true);
        count++;
      }
      const duration = Date.now() - start;

      console.log(`consistent=${consistent}: ${count} records in ${duration}ms`);
      expect(count).toBe(RECORDS);
    });
  }
});
