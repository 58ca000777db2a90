/**
 * Main store implementation
 */

import { performance } from "node:perf_hooks";
import type { Backend } from "./backend/types.js";
import { isNoScriptError } from "./backend/types.js";
import {
  InvalidOptionsError,
  OperationAbortedError,
  ScriptLoadError,
  StoreOperationError,
} from "./errors.js";
import { itemsOf, noItems } from "./items.js";
import { composeKey, indexKey, type Id } from "./keys.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import { metrics as defaultMetrics, type MetricsCollector } from "./observability/metrics.js";
import { paginate } from "./paginate.js";
import { scoreBounds, toScore } from "./range.js";
import { decodeRangeReply, RANGE_SCRIPT, ScriptHandle } from "./script.js";
import type {
  BulkSetRecord,
  CallOptions,
  PageFetch,
  PageItem,
  PaginateOptions,
  Store,
  StoreOptions,
  TimeRange,
  Timestamp,
} from "./types.js";
import {
  validateId,
  validatePageArgs,
  validateStoreOptions,
  validateTimestamp,
  type ResolvedStoreOptions,
} from "./validation.js";

const RANGE_SCRIPT_FAILURE = "failed to execute range script";

/**
 * Key/value store with a last-modified ordering index
 *
 * Every record lives at `namespace + delimiter + id...`; its last-modified
 * time is the score of the same key in the sorted set
 * `namespace + delimiter + "lmIdx"`. Writes and deletes touch both in one
 * MULTI/EXEC unit.
 *
 * @example
 * ```typescript
 * const store = openStore({ backend: new RedisBackend(), namespace: "orders" });
 *
 * await store.set(["eu", "42"], Buffer.from('{"total":10}'), new Date());
 *
 * const items = await store.paginate({ from: yesterday }, 0, 100, { consistent: true });
 * for await (const item of items) {
 *   if (!item.ok) throw item.error;
 *   console.log(item.value?.toString());
 * }
 * ```
 */
class TimeKVStore implements Store {
  readonly namespace: string;
  readonly #backend: Backend;
  readonly #delimiter: string;
  readonly #indexKey: string;
  readonly #script: ScriptHandle;
  readonly #logger: Logger;
  readonly #metrics: MetricsCollector;

  constructor(options: ResolvedStoreOptions) {
    this.namespace = options.namespace;
    this.#backend = options.backend;
    this.#delimiter = options.delimiter;
    this.#indexKey = indexKey(options.namespace, options.delimiter);
    this.#logger = options.logger ?? defaultLogger;
    this.#metrics = options.metrics ?? defaultMetrics;
    this.#script = new ScriptHandle(RANGE_SCRIPT, async (body) => {
      const sha = await this.#backend.scriptLoad(body);
      this.#logger.debug("script.registered", {
        namespace: this.namespace,
        op: "fetchPageConsistent",
        details: { sha },
      });
      return sha;
    });
  }

  key(id: Id): string {
    return composeKey(this.namespace, this.#delimiter, id);
  }

  /**
   * Validated key of a record
   *
   * @throws {InvalidOptionsError} If the id is malformed or composes to the
   * index key
   */
  #recordKey(id: Id): string {
    validateId(id);
    const key = this.key(id);
    if (key === this.#indexKey) {
      throw new InvalidOptionsError([`id: ${JSON.stringify(id)} composes to the index key`]);
    }
    return key;
  }

  /**
   * Read a record's payload
   *
   * @returns The payload, or null when no record has this id
   * @throws {StoreOperationError} If the backend call fails
   */
  async get(id: Id, options: CallOptions = {}): Promise<Uint8Array | null> {
    const key = this.#recordKey(id);

    return this.#instrument("get", () =>
      this.#call("get", options.signal, "failed to get entity", () => this.#backend.get(key))
    );
  }

  /**
   * Write a record and its index entry as one atomic unit
   *
   * Overwrites any previous value; the index entry's score becomes
   * `lastModified` in nanoseconds.
   *
   * @returns True if the record already existed, taken from the ZADD reply
   * @throws {StoreOperationError} If the transaction fails
   */
  async set(
    id: Id,
    data: Uint8Array,
    lastModified: Timestamp,
    options: CallOptions = {}
  ): Promise<boolean> {
    const key = this.#recordKey(id);
    validateTimestamp(lastModified);

    return this.#instrument("set", async () => {
      const replies = await this.#call("set", options.signal, "failed to set entity", () =>
        this.#backend
          .transaction()
          .set(key, data)
          .zadd(this.#indexKey, toScore(lastModified), key)
          .exec()
      );
      // ZADD replies with the number of members added; 0 means an update
      return replies[1] === 0;
    });
  }

  /**
   * Write many records and their index entries as one atomic unit
   *
   * An empty list is a no-op. On failure the batch may be partially applied
   * from the caller's point of view; nothing is rolled back here.
   *
   * @throws {StoreOperationError} If the transaction fails
   */
  async bulkSet(records: readonly BulkSetRecord[], options: CallOptions = {}): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const entries = records.map((record) => {
      const key = this.#recordKey(record.id);
      validateTimestamp(record.lastModified);
      return { key, record };
    });

    await this.#instrument("bulkSet", async () => {
      const tx = this.#backend.transaction();
      for (const { key, record } of entries) {
        tx.set(key, record.data).zadd(this.#indexKey, toScore(record.lastModified), key);
      }

      await this.#call("bulkSet", options.signal, "failed to bulk insert records", () =>
        tx.exec()
      );

      this.#logger.debug("bulk_set.committed", {
        namespace: this.namespace,
        op: "bulkSet",
        details: { records: records.length },
      });
    });
  }

  /**
   * Remove a record and its index entry as one atomic unit
   * Removing an absent record is not an error.
   *
   * @throws {StoreOperationError} If the transaction fails
   */
  async delete(id: Id, options: CallOptions = {}): Promise<void> {
    const key = this.#recordKey(id);

    await this.#instrument("delete", () =>
      this.#call("delete", options.signal, "failed to delete entity", () =>
        this.#backend.transaction().del(key).zrem(this.#indexKey, key).exec()
      )
    );
  }

  async exists(id: Id, options: CallOptions = {}): Promise<boolean> {
    const key = this.#recordKey(id);

    return this.#instrument("exists", async () => {
      const count = await this.#call(
        "exists",
        options.signal,
        "failed to check if entity exists",
        () => this.#backend.exists(key)
      );
      return count > 0;
    });
  }

  /**
   * Fetch one page of a range with three independent commands:
   * ZCOUNT for the total, ZRANGEBYSCORE for the page's keys, MGET for
   * their values.
   *
   * Cheap but not linearizable: a concurrent delete can leave the page
   * shorter than `total` implies (or a `null` value), and a concurrent
   * overwrite can return a value whose timestamp is outside the range.
   */
  readonly fetchPage: PageFetch = async (range, offset, limit, options = {}) => {
    validatePageArgs(offset, limit);
    validateRange(range);
    const [min, max] = scoreBounds(range);
    const { signal } = options;

    return this.#instrument("fetchPage", async () => {
      const total = await this.#call("fetchPage", signal, "failed to count", () =>
        this.#backend.zcount(this.#indexKey, min, max)
      );

      const keys = await this.#call("fetchPage", signal, "failed to execute zrangebyscore", () =>
        this.#backend.zrangeByScore(this.#indexKey, min, max, offset, limit)
      );

      if (keys.length === 0) {
        return { items: noItems(), total };
      }

      const values = await this.#call("fetchPage", signal, "failed to execute mget", () =>
        this.#backend.mget(keys)
      );

      return { items: itemsOf(values), total };
    });
  };

  /**
   * Fetch one page of a range with a single server-side script, so the
   * total and the values form one consistent snapshot.
   *
   * The script holds the server for the whole page; keep pages to a few
   * thousand entries at most and use {@link paginate} for bigger ranges.
   *
   * @throws {ScriptLoadError} If the script cannot be registered
   * @throws {StoreOperationError} If the script evaluation fails
   * @throws {UnexpectedScriptResultError} If the reply is not `[total, values]`
   */
  readonly fetchPageConsistent: PageFetch = async (range, offset, limit, options = {}) => {
    validatePageArgs(offset, limit);
    validateRange(range);
    const [min, max] = scoreBounds(range);

    return this.#instrument("fetchPageConsistent", async () => {
      const reply = await this.#evalRange([min, max, offset, limit], options.signal);
      const { total, values } = decodeRangeReply(reply);

      return { items: values.length === 0 ? noItems() : itemsOf(values), total };
    });
  };

  /**
   * Read a whole range as one lazy sequence, page by page
   * @see paginate
   */
  async paginate(
    range: TimeRange,
    offset: number,
    limit: number,
    options: PaginateOptions = {}
  ): Promise<AsyncIterable<PageItem>> {
    const { consistent = false, ...callOptions } = options;
    const fetch = consistent ? this.fetchPageConsistent : this.fetchPage;
    return paginate(fetch, range, offset, limit, callOptions);
  }

  async close(): Promise<void> {
    await this.#backend.close();
  }

  /**
   * Evaluate the range script, registering it on first use. A NOSCRIPT
   * reply (script cache flushed on the server) re-registers it once.
   */
  async #evalRange(args: Array<string | number>, signal: AbortSignal | undefined): Promise<unknown> {
    const keys = [this.#indexKey];
    const sha = await this.#loadScript(signal);

    try {
      return await this.#call("fetchPageConsistent", signal, RANGE_SCRIPT_FAILURE, () =>
        this.#backend.evalsha(sha, keys, args)
      );
    } catch (err) {
      if (!(err instanceof StoreOperationError) || !isNoScriptError(err.cause)) {
        throw err;
      }

      this.#script.invalidate(sha);
      this.#logger.warn("script.invalidated", {
        namespace: this.namespace,
        op: "fetchPageConsistent",
        message: "range script unknown to backend, registering again",
        details: { sha },
      });

      const fresh = await this.#loadScript(signal);
      return this.#call("fetchPageConsistent", signal, RANGE_SCRIPT_FAILURE, () =>
        this.#backend.evalsha(fresh, keys, args)
      );
    }
  }

  async #loadScript(signal: AbortSignal | undefined): Promise<string> {
    throwIfAborted("fetchPageConsistent", signal);
    try {
      return await this.#script.get();
    } catch (err) {
      throw new ScriptLoadError({ cause: err });
    }
  }

  /**
   * One backend round trip: honours the abort signal and wraps failures
   * with the operation's name
   */
  async #call<T>(
    op: string,
    signal: AbortSignal | undefined,
    failure: string,
    fn: () => Promise<T>
  ): Promise<T> {
    throwIfAborted(op, signal);
    try {
      return await fn();
    } catch (err) {
      throw new StoreOperationError(op, failure, { cause: err });
    }
  }

  /**
   * Time a whole operation into the metrics collector
   */
  async #instrument<T>(op: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    let ok = false;

    try {
      const result = await fn();
      ok = true;
      return result;
    } finally {
      this.#metrics.record(this.namespace, op, performance.now() - start, ok);
    }
  }
}

function throwIfAborted(op: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationAbortedError(op, { cause: signal.reason });
  }
}

function validateRange(range: TimeRange): void {
  if (range.from !== undefined) validateTimestamp(range.from);
  if (range.to !== undefined) validateTimestamp(range.to);
}

/**
 * Open a store over a backend
 *
 * @throws {InvalidOptionsError} If the options are invalid
 *
 * @example
 * ```typescript
 * const store = openStore({
 *   backend: new RedisBackend("redis://localhost:6379"),
 *   namespace: "orders",
 *   delimiter: DELIM_PIPE,
 * });
 * ```
 */
export function openStore(options: StoreOptions): Store {
  return new TimeKVStore(validateStoreOptions(options));
}
