/**
 * timekv SDK
 *
 * Key/value records with a last-modified ordering index, range pages and
 * a page combinator, on Redis or an in-process backend
 */

// Re-export types
export type {
  Timestamp,
  TimeRange,
  BulkSetRecord,
  PageItem,
  Page,
  CallOptions,
  PageFetch,
  PaginateOptions,
  StoreOptions,
  Store,
} from "./types.js";
export type { Backend, Transaction } from "./backend/types.js";
export type { Id } from "./keys.js";

// Store
export { openStore } from "./store.js";
export { paginate } from "./paginate.js";

// Backends
export { RedisBackend, DEFAULT_REDIS_URL, unwrapExecResult } from "./backend/redis.js";
export type { RedisClient, RedisMulti } from "./backend/redis.js";
export {
  MemoryBackend,
  SortedSet,
  parseScore,
  type MemoryBackendOptions,
  type MemoryCommand,
  type Procedure,
} from "./backend/memory.js";
export { isNoScriptError } from "./backend/types.js";

// Utilities
export { DELIM_UNIT, DELIM_PIPE, INDEX_SUFFIX, composeKey, indexKey, segmentsOf } from "./keys.js";
export { toNanoseconds, toScore, scoreBounds } from "./range.js";
export { itemsOf, noItems, ownedCopy, collectValues } from "./items.js";
export { RANGE_SCRIPT, ScriptHandle, decodeRangeReply, type RangeReply } from "./script.js";
export {
  StoreOptionsSchema,
  validateStoreOptions,
  validatePageArgs,
  validateTimestamp,
  validateId,
} from "./validation.js";

// Observability
export { Logger, logger, type LogLevel, type LogEntry, type LogSink } from "./observability/logs.js";
export { MetricsCollector, metrics, type OperationMetrics } from "./observability/metrics.js";

// Errors
export {
  TimeKVError,
  StoreOperationError,
  ScriptLoadError,
  UnexpectedScriptResultError,
  PageFetchError,
  InvalidOptionsError,
  OperationAbortedError,
} from "./errors.js";
