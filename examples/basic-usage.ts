/**
 * Basic Usage Example
 *
 * Demonstrates record writes, reads and deletes against a Redis server.
 * Run with: npx tsx examples/basic-usage.ts
 * (TIMEKV_REDIS_URL selects the server, default redis://127.0.0.1:6379)
 */

import { DEFAULT_REDIS_URL, openStore, RedisBackend } from "@timekv/sdk";

const text = (value: Uint8Array | null): string =>
  value === null ? "(absent)" : Buffer.from(value).toString("utf8");

async function main() {
  // Open store
  console.log("📂 Opening store...");
  const store = openStore({
    backend: new RedisBackend(process.env.TIMEKV_REDIS_URL ?? DEFAULT_REDIS_URL),
    namespace: "examples-basic",
  });

  try {
    // CREATE: ids may have several segments
    console.log("\n✏️  Creating record...");
    const existed = await store.set(
      ["task", "task-1"],
      Buffer.from(JSON.stringify({ title: "Write the report", status: "open" })),
      new Date()
    );
    console.log(existed ? "✅ Updated task-1" : "✅ Created task-1");
    console.log(`   Key: ${JSON.stringify(store.key(["task", "task-1"]))}`);

    // READ
    console.log("\n📖 Reading record...");
    console.log(`   ${text(await store.get(["task", "task-1"]))}`);

    // UPDATE: same id, newer timestamp; the index entry moves
    console.log("\n✏️  Updating record...");
    const updated = await store.set(
      ["task", "task-1"],
      Buffer.from(JSON.stringify({ title: "Write the report", status: "done" })),
      new Date()
    );
    console.log(updated ? "✅ Updated task-1" : "✅ Created task-1");

    // BULK: one transaction
    console.log("\n📦 Writing a batch...");
    const now = Date.now();
    await store.bulkSet(
      ["task-2", "task-3", "task-4"].map((id, i) => ({
        id: ["task", id],
        data: Buffer.from(JSON.stringify({ title: `Task ${i + 2}`, status: "open" })),
        lastModified: new Date(now + i),
      }))
    );
    console.log("✅ Wrote 3 records");

    // DELETE
    console.log("\n🗑️  Deleting record...");
    await store.delete(["task", "task-1"]);
    console.log(`   task-1 exists: ${await store.exists(["task", "task-1"])}`);
    console.log(`   task-2 exists: ${await store.exists(["task", "task-2"])}`);

    // Cleanup
    for (const id of ["task-2", "task-3", "task-4"]) {
      await store.delete(["task", id]);
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
