/**
 * Core types for timekv
 */

import type { Backend } from "./backend/types.js";
import type { Id } from "./keys.js";
import type { Logger } from "./observability/logs.js";
import type { MetricsCollector } from "./observability/metrics.js";

/**
 * Point in time used as an index score
 *
 * A `Date` (millisecond precision) or a `bigint` count of nanoseconds
 * since the Unix epoch.
 */
export type Timestamp = Date | bigint;

/**
 * Inclusive score range; an absent bound is open (`-inf` / `+inf`)
 */
export interface TimeRange {
  from?: Timestamp;
  to?: Timestamp;
}

/**
 * A record to write with {@link Store.bulkSet}
 */
export interface BulkSetRecord {
  id: Id;
  data: Uint8Array;
  lastModified: Timestamp;
}

/**
 * One element of a page sequence
 *
 * `value` is a borrowed view: read it during the current iteration step
 * and pass it through `ownedCopy()` before keeping it. It is `null` when an
 * index member has no primary value (deleted between the index read and the
 * value read, or left behind by a partial failure).
 *
 * An `ok: false` item is always the last item of its sequence.
 */
export type PageItem =
  | { ok: true; value: Uint8Array | null }
  | { ok: false; error: Error };

/**
 * One page of a range query
 */
export interface Page {
  /** Lazy sequence of the page's payloads, in ascending score order */
  items: AsyncIterable<PageItem>;
  /** Number of index entries in the whole range at fetch time */
  total: number;
}

/**
 * Options accepted by every store operation
 */
export interface CallOptions {
  /** Checked before each backend round trip */
  signal?: AbortSignal;
}

/**
 * Fetches one page of a range; both store fetch strategies fit this shape
 */
export type PageFetch = (
  range: TimeRange,
  offset: number,
  limit: number,
  options?: CallOptions
) => Promise<Page>;

/**
 * Options for {@link Store.paginate}
 */
export interface PaginateOptions extends CallOptions {
  /** Use the atomic server-side range script for each page (default: false) */
  consistent?: boolean;
}

/**
 * Store configuration
 */
export interface StoreOptions {
  /** Backend holding records and the ordering index */
  backend: Backend;
  /** Prefix of every key this store writes, e.g. the entity type */
  namespace: string;
  /** Joins namespace and identifier segments (default: DELIM_UNIT) */
  delimiter?: string;
  /** Logger for store events (default: shared logger) */
  logger?: Logger;
  /** Metrics sink (default: shared collector) */
  metrics?: MetricsCollector;
}

/**
 * Public store interface
 */
export interface Store {
  /** Namespace this store writes under */
  readonly namespace: string;

  /** Storage key of an identifier */
  key(id: Id): string;

  /**
   * Read a record's payload
   * @returns The payload, or null when the key is absent
   */
  get(id: Id, options?: CallOptions): Promise<Uint8Array | null>;

  /**
   * Write a record and its index entry atomically
   * @returns True if the record existed before this write
   */
  set(id: Id, data: Uint8Array, lastModified: Timestamp, options?: CallOptions): Promise<boolean>;

  /** Write many records and their index entries as one atomic unit */
  bulkSet(records: readonly BulkSetRecord[], options?: CallOptions): Promise<void>;

  /** Remove a record and its index entry atomically */
  delete(id: Id, options?: CallOptions): Promise<void>;

  /** Check whether a record exists */
  exists(id: Id, options?: CallOptions): Promise<boolean>;

  /** Range page via separate count, select and fetch commands */
  fetchPage: PageFetch;

  /** Range page via one atomic server-side script */
  fetchPageConsistent: PageFetch;

  /** Whole range as one lazy sequence, fetched page by page */
  paginate(
    range: TimeRange,
    offset: number,
    limit: number,
    options?: PaginateOptions
  ): Promise<AsyncIterable<PageItem>>;

  /** Release the backend connection */
  close(): Promise<void>;
}
