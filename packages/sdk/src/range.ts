/**
 * Timestamp to score conversion
 */

import type { TimeRange, Timestamp } from "./types.js";

const NANOS_PER_MILLI = 1_000_000n;

/**
 * Nanoseconds since the Unix epoch
 */
export function toNanoseconds(ts: Timestamp): bigint {
  if (typeof ts === "bigint") {
    return ts;
  }
  return BigInt(ts.getTime()) * NANOS_PER_MILLI;
}

/**
 * Score argument for ZADD
 */
export function toScore(ts: Timestamp): string {
  return toNanoseconds(ts).toString();
}

/**
 * Inclusive `[min, max]` score bounds of a range, open ends as -inf / +inf
 */
export function scoreBounds(range: TimeRange): [min: string, max: string] {
  return [
    range.from !== undefined ? toScore(range.from) : "-inf",
    range.to !== undefined ? toScore(range.to) : "+inf",
  ];
}
