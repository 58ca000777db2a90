/**
 * Timing utilities for tests
 */

/**
 * Fixed reference instant used across tests
 */
export const BASE_TIME = new Date("2025-01-01T00:00:00.000Z");

/**
 * Instant `seconds` after `base`
 */
export function at(seconds: number, base: Date = BASE_TIME): Date {
  return new Date(base.getTime() + seconds * 1000);
}

