import { describe, it, expect, beforeEach } from "vitest";
import {
  at,
  createMemoryStore,
  drain,
  sampleRecords,
  BASE_TIME,
  type MemoryStoreHandle,
} from "@timekv/testkit";
import { MemoryBackend } from "./backend/memory.js";
import {
  OperationAbortedError,
  PageFetchError,
  ScriptLoadError,
  StoreOperationError,
  UnexpectedScriptResultError,
} from "./errors.js";
import { toScore } from "./range.js";
import { openStore } from "./store.js";
import type { Store } from "./types.js";

const bytes = (s: string): Buffer => Buffer.from(s);
const INDEX = "test\x1flmIdx";
const NOW = at(3600);
const minutesAgo = (m: number): Date => new Date(NOW.getTime() - m * 60_000);

/**
 * Five records: one now, three in the last few minutes, one hours ago
 */
async function seed(store: Store): Promise<void> {
  await store.set(["a", "a"], bytes('{"id":"a"}'), NOW);
  await store.bulkSet([
    { id: ["a", "b", "b"], data: bytes('{"id":"b"}'), lastModified: minutesAgo(1) },
    { id: ["a", "b", "c"], data: bytes('{"id":"c"}'), lastModified: minutesAgo(2) },
    { id: ["a", "b", "d"], data: bytes('{"id":"d"}'), lastModified: minutesAgo(3) },
    { id: ["a", "b", "e"], data: bytes('{"id":"e"}'), lastModified: minutesAgo(240) },
  ]);
}

const STRATEGIES = ["fetchPage", "fetchPageConsistent"] as const;

describe.each(STRATEGIES)("Store.%s()", (strategy) => {
  let handle: MemoryStoreHandle;

  beforeEach(async () => {
    handle = createMemoryStore();
    await seed(handle.store);
  });

  it("should return a page of the range in ascending time order", async () => {
    const page = await handle.store[strategy]({ from: minutesAgo(3), to: minutesAgo(1) }, 0, 2);

    expect(page.total).toBe(3);
    expect((await drain(page.items)).values).toEqual(['{"id":"d"}', '{"id":"c"}']);
  });

  it("should treat missing bounds as open", async () => {
    const page = await handle.store[strategy]({}, 0, 10);

    expect(page.total).toBe(5);
    expect((await drain(page.items)).values).toEqual([
      '{"id":"e"}',
      '{"id":"d"}',
      '{"id":"c"}',
      '{"id":"b"}',
      '{"id":"a"}',
    ]);
  });

  it("should skip offset entries", async () => {
    const page = await handle.store[strategy]({}, 2, 2);

    expect(page.total).toBe(5);
    expect((await drain(page.items)).values).toEqual(['{"id":"c"}', '{"id":"b"}']);
  });

  it("should include entries exactly on the bounds", async () => {
    const page = await handle.store[strategy]({ from: minutesAgo(2), to: minutesAgo(2) }, 0, 5);

    expect(page.total).toBe(1);
    expect((await drain(page.items)).values).toEqual(['{"id":"c"}']);
  });

  it("should keep the total when the offset is past the range", async () => {
    const page = await handle.store[strategy]({}, 10, 2);

    expect(page.total).toBe(5);
    expect((await drain(page.items)).values).toEqual([]);
  });

  it("should return nothing for an empty range", async () => {
    const page = await handle.store[strategy]({ from: at(7200) }, 0, 5);

    expect(page.total).toBe(0);
    expect((await drain(page.items)).values).toEqual([]);
  });

  it("should return min(limit, matches) payloads, all inside the range", async () => {
    const from = minutesAgo(3);
    const to = NOW;

    for (let limit = 1; limit <= 6; limit++) {
      const page = await handle.store[strategy]({ from, to }, 0, limit);
      const { values } = await drain(page.items);

      expect(page.total).toBe(4);
      expect(values).toHaveLength(Math.min(limit, 4));
      expect(values).not.toContain('{"id":"e"}');
    }
  });

  it("should yield null for an index entry without a value", async () => {
    await handle.backend
      .transaction()
      .zadd(INDEX, toScore(at(7200)), "test\x1fghost")
      .exec();

    const page = await handle.store[strategy]({ from: at(7200) }, 0, 5);

    expect(page.total).toBe(1);
    expect((await drain(page.items)).values).toEqual([null]);
  });

  it("should reflect deletes", async () => {
    await handle.store.delete(["a", "b", "c"]);

    const page = await handle.store[strategy]({ from: minutesAgo(3), to: minutesAgo(1) }, 0, 5);

    expect(page.total).toBe(2);
    expect((await drain(page.items)).values).toEqual(['{"id":"d"}', '{"id":"b"}']);
  });

  it("should stop before the backend when aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      handle.store[strategy]({}, 0, 5, { signal: controller.signal })
    ).rejects.toBeInstanceOf(OperationAbortedError);
    expect(handle.backend.calls("zcount")).toBe(0);
    expect(handle.backend.calls("scriptLoad")).toBe(0);
  });

  it("should reject a non-positive limit", async () => {
    await expect(handle.store[strategy]({}, 0, 0)).rejects.toThrow("limit must be > 0");
  });
});

describe("Store.fetchPage() steps", () => {
  let handle: MemoryStoreHandle;

  beforeEach(async () => {
    handle = createMemoryStore();
    await seed(handle.store);
  });

  it("should skip MGET when no member is selected", async () => {
    await handle.store.fetchPage({}, 10, 2);

    expect(handle.backend.calls("mget")).toBe(0);
  });

  it.each([
    ["zcount", "failed to count: down"],
    ["zrangeByScore", "failed to execute zrangebyscore: down"],
    ["mget", "failed to execute mget: down"],
  ] as const)("should name the failing %s step", async (command, message) => {
    handle.backend.failNext(command, new Error("down"));

    const err = await handle.store.fetchPage({}, 0, 2).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreOperationError);
    expect(err).toMatchObject({ operation: "fetchPage", message });
  });

  it("should pass through a value overwritten after selection", async () => {
    // A writer moves "d" out of the range between ZRANGEBYSCORE and MGET
    class RacingBackend extends MemoryBackend {
      override async zrangeByScore(
        key: string,
        min: string,
        max: string,
        offset: number,
        count: number
      ): Promise<string[]> {
        const members = await super.zrangeByScore(key, min, max, offset, count);
        await this.transaction()
          .set("test\x1fa\x1fb\x1fd", bytes('{"id":"d","moved":true}'))
          .zadd(INDEX, toScore(at(9000)), "test\x1fa\x1fb\x1fd")
          .exec();
        return members;
      }
    }
    const backend = new RacingBackend();
    const store = openStore({ backend, namespace: "test" });
    await seed(store);

    const page = await store.fetchPage({ from: minutesAgo(3), to: minutesAgo(1) }, 0, 1);

    expect(page.total).toBe(3);
    expect((await drain(page.items)).values).toEqual(['{"id":"d","moved":true}']);
  });
});

describe("Store.fetchPageConsistent() script handling", () => {
  let handle: MemoryStoreHandle;

  beforeEach(async () => {
    handle = createMemoryStore();
    await seed(handle.store);
  });

  it("should register the script once across calls", async () => {
    await handle.store.fetchPageConsistent({}, 0, 2);
    await handle.store.fetchPageConsistent({}, 2, 2);
    await handle.store.fetchPageConsistent({}, 4, 2);

    expect(handle.backend.calls("scriptLoad")).toBe(1);
    expect(handle.backend.calls("evalsha")).toBe(3);
  });

  it("should register the script once for concurrent first calls", async () => {
    await Promise.all([
      handle.store.fetchPageConsistent({}, 0, 2),
      handle.store.fetchPageConsistent({}, 2, 2),
      handle.store.fetchPageConsistent({}, 4, 2),
    ]);

    expect(handle.backend.calls("scriptLoad")).toBe(1);
  });

  it("should retry registration after a failure", async () => {
    handle.backend.failNext("scriptLoad", new Error("NOPERM no script permission"));

    const first = handle.store.fetchPageConsistent({}, 0, 2);
    await expect(first).rejects.toBeInstanceOf(ScriptLoadError);
    await expect(first).rejects.toThrow("failed to load range script: NOPERM no script permission");

    const page = await handle.store.fetchPageConsistent({}, 0, 2);
    expect(page.total).toBe(5);
    expect(handle.backend.calls("scriptLoad")).toBe(2);
  });

  it("should register again when the server forgot the script", async () => {
    await handle.store.fetchPageConsistent({}, 0, 2);
    handle.backend.flushScripts();

    const page = await handle.store.fetchPageConsistent({}, 0, 2);

    expect(page.total).toBe(5);
    expect(handle.backend.calls("scriptLoad")).toBe(2);
    expect(handle.backend.calls("evalsha")).toBe(3);
    expect(handle.logs.some((line) => line.includes("[WARN] [script.invalidated]"))).toBe(true);
  });

  it("should wrap evaluation failures", async () => {
    handle.backend.failNext("evalsha", new Error("BUSY script running"));

    const err = await handle.store.fetchPageConsistent({}, 0, 2).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreOperationError);
    expect(err).toMatchObject({
      operation: "fetchPageConsistent",
      message: "failed to execute range script: BUSY script running",
    });
  });

  it("should flag a reply of the wrong shape", async () => {
    class DriftedBackend extends MemoryBackend {
      override async evalsha(): Promise<unknown> {
        return [3];
      }
    }
    const store = openStore({ backend: new DriftedBackend(), namespace: "test" });

    await expect(store.fetchPageConsistent({}, 0, 2)).rejects.toBeInstanceOf(
      UnexpectedScriptResultError
    );
  });
});

describe("Store.paginate()", () => {
  let handle: MemoryStoreHandle;
  const expected = Array.from({ length: 10 }, (_, i) => JSON.stringify({ n: i }));

  beforeEach(async () => {
    handle = createMemoryStore();
    await handle.store.bulkSet(sampleRecords(10, BASE_TIME));
  });

  it("should read the whole range page by page", async () => {
    const items = await handle.store.paginate({ from: BASE_TIME, to: at(60) }, 0, 3);

    expect((await drain(items)).values).toEqual(expected);
    expect(handle.backend.calls("zcount")).toBe(4);
    expect(handle.backend.calls("evalsha")).toBe(0);
  });

  it("should use the range script when consistent", async () => {
    const items = await handle.store.paginate({}, 0, 3, { consistent: true });

    expect((await drain(items)).values).toEqual(expected);
    expect(handle.backend.calls("evalsha")).toBe(4);
    expect(handle.backend.calls("zcount")).toBe(0);
  });

  it("should end with one error item when a later page fails", async () => {
    const items = await handle.store.paginate({}, 0, 3);
    handle.backend.failNext("zcount", new Error("down"));

    const { values, errors } = await drain(items);

    expect(values).toEqual(expected.slice(0, 3));
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(PageFetchError);
    expect(errors[0]?.message).toBe("fetching next page failed: failed to count: down");
  });

  it("should surface cancellation of a later page as the error item", async () => {
    const controller = new AbortController();
    const items = await handle.store.paginate({}, 0, 5, { signal: controller.signal });
    controller.abort();

    const { values, errors } = await drain(items);

    expect(values).toEqual(expected.slice(0, 5));
    expect(errors.map((e) => e.message)).toEqual(["fetching next page failed: fetchPage aborted"]);
  });

  it("should reject when the first page fails", async () => {
    handle.backend.failNext("scriptLoad", new Error("NOPERM"));

    await expect(handle.store.paginate({}, 0, 3, { consistent: true })).rejects.toThrow(
      "fetching first page failed: failed to load range script: NOPERM"
    );
  });
});
