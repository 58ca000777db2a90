/**
 * Range Pagination Example
 *
 * Reads records by last-modified time, one page at a time and through the
 * page combinator, with both read strategies.
 * Run with: npx tsx examples/range-pagination.ts
 */

import {
  DEFAULT_REDIS_URL,
  openStore,
  ownedCopy,
  RedisBackend,
  type PageItem,
} from "@timekv/sdk";

const MINUTE = 60_000;

async function printAll(items: AsyncIterable<PageItem>): Promise<number> {
  let count = 0;
  for await (const item of items) {
    if (!item.ok) {
      throw item.error;
    }
    count++;
    console.log(`   ${item.value === null ? "(deleted)" : Buffer.from(item.value).toString()}`);
  }
  return count;
}

async function main() {
  const store = openStore({
    backend: new RedisBackend(process.env.TIMEKV_REDIS_URL ?? DEFAULT_REDIS_URL),
    namespace: "examples-range",
  });

  try {
    // Seed: a, b, c, d one minute apart, e four hours back
    const now = Date.now();
    console.log("✏️  Seeding records...");
    await store.bulkSet([
      { id: ["a", "a"], data: Buffer.from('{"key":"a"}'), lastModified: new Date(now) },
      { id: ["b", "b"], data: Buffer.from('{"key":"b"}'), lastModified: new Date(now - MINUTE) },
      { id: ["c", "c"], data: Buffer.from('{"key":"c"}'), lastModified: new Date(now - 2 * MINUTE) },
      { id: ["d", "d"], data: Buffer.from('{"key":"d"}'), lastModified: new Date(now - 3 * MINUTE) },
      { id: ["e", "e"], data: Buffer.from('{"key":"e"}'), lastModified: new Date(now - 240 * MINUTE) },
    ]);

    // One page: the last five minutes, two at a time
    const range = { from: new Date(now - 5 * MINUTE), to: new Date(now) };
    console.log("\n📄 First page (two-step read)...");
    const page = await store.fetchPage(range, 0, 2);
    const shown = await printAll(page.items);
    console.log(`   ${shown} of ${page.total}`);

    // Values are borrowed views; copy the ones kept past the loop
    console.log("\n📌 Keeping the newest payload...");
    let newest: Uint8Array | null = null;
    for await (const item of (await store.fetchPageConsistent(range, 3, 1)).items) {
      if (item.ok) newest = ownedCopy(item.value);
    }
    console.log(`   ${newest === null ? "(none)" : Buffer.from(newest).toString()}`);

    // Every page, each one a consistent snapshot
    console.log("\n📚 Whole range (consistent pages of 2)...");
    const items = await store.paginate(range, 0, 2, { consistent: true });
    console.log(`   ${await printAll(items)} records`);

    // Cleanup
    for (const key of ["a", "b", "c", "d", "e"]) {
      await store.delete([key, key]);
    }
    console.log("\n✨ Done!");
  } finally {
    await store.close();
  }
}

main().catch((error) => {
  console.error("❌ Error:", error);
  process.exit(1);
});
