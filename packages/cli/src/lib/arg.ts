/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { Timestamp } from "@timekv/sdk";

const MAX_PAGE = 10000;

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a page size: a positive integer no larger than 10000
 */
export function parsePageSize(value: string, name: string): number {
  const parsed = parseNonNegativeInt(value, name);

  if (parsed === 0) {
    throw new InvalidArgumentError(`${name} must be > 0`);
  }
  // One page is one server round trip; keep it bounded
  if (parsed > MAX_PAGE) {
    throw new InvalidArgumentError(`${name} must be <= ${MAX_PAGE}`);
  }

  return parsed;
}

/**
 * Parse a timestamp: integer nanoseconds since the epoch, or an ISO-8601 date
 */
export function parseTimestamp(value: string, name: string): Timestamp {
  const trimmed = value.trim();

  if (/^-?\d+$/.test(trimmed)) {
    return BigInt(trimmed);
  }

  const ms = Date.parse(trimmed);
  if (Number.isNaN(ms)) {
    throw new InvalidArgumentError(
      `${name} must be an ISO-8601 date or integer nanoseconds, got "${value}"`
    );
  }
  return new Date(ms);
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}
