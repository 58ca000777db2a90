/**
 * Zod schemas for store options and call arguments
 */

import { z } from "zod";
import type { Backend } from "./backend/types.js";
import { InvalidOptionsError } from "./errors.js";
import { DELIM_UNIT, type Id } from "./keys.js";
import { Logger } from "./observability/logs.js";
import { MetricsCollector } from "./observability/metrics.js";
import type { StoreOptions, Timestamp } from "./types.js";

const BACKEND_METHODS = [
  "get",
  "mget",
  "exists",
  "zcount",
  "zrangeByScore",
  "scriptLoad",
  "evalsha",
  "transaction",
  "close",
] as const;

function isBackend(value: unknown): value is Backend {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  return BACKEND_METHODS.every(
    (method) => typeof Reflect.get(value, method) === "function"
  );
}

export const StoreOptionsSchema = z.object({
  backend: z.custom<Backend>(isBackend, {
    message: `backend must implement ${BACKEND_METHODS.join(", ")}`,
  }),
  namespace: z.string().min(1, "namespace must be non-empty"),
  delimiter: z.string().min(1, "delimiter must be non-empty").default(DELIM_UNIT),
  logger: z.instanceof(Logger).optional(),
  metrics: z.instanceof(MetricsCollector).optional(),
});

export type ResolvedStoreOptions = z.output<typeof StoreOptionsSchema>;

export const TimestampSchema = z.union([
  z.date({ invalid_type_error: "timestamp must be a valid Date or a bigint" }),
  z.bigint({ invalid_type_error: "timestamp must be a valid Date or a bigint" }),
]);

export const IdSchema = z.union([
  z.string(),
  z.array(z.string()).min(1, "id must have at least one segment"),
]);

export const PageArgsSchema = z.object({
  offset: z.number().int("offset must be an integer").nonnegative("offset must be >= 0"),
  limit: z.number().int("limit must be an integer").positive("limit must be > 0"),
});

/**
 * Render zod issues as "path: message" strings
 */
function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidOptionsError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Validate store options and fill defaults
 * @throws {InvalidOptionsError} If any option is invalid
 */
export function validateStoreOptions(options: StoreOptions): ResolvedStoreOptions {
  return parseOrThrow(StoreOptionsSchema, options);
}

/**
 * @throws {InvalidOptionsError} If the timestamp is not a valid Date or bigint
 */
export function validateTimestamp(ts: Timestamp): void {
  parseOrThrow(TimestampSchema, ts);
}

/**
 * @throws {InvalidOptionsError} If the id is neither a string nor a non-empty list of strings
 */
export function validateId(id: Id): void {
  parseOrThrow(IdSchema, id);
}

/**
 * @throws {InvalidOptionsError} If offset is negative or limit is not positive
 */
export function validatePageArgs(offset: number, limit: number): void {
  parseOrThrow(PageArgsSchema, { offset, limit });
}
