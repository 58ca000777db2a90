/**
 * Atomic range script and its cached registration handle
 */

import { UnexpectedScriptResultError } from "./errors.js";

/**
 * Counts, selects and fetches a score range in one server-side evaluation.
 *
 * KEYS[1] sorted set, ARGV: min, max, offset, count.
 * Replies `{ total, values }`; `values` holds nil for members whose primary
 * key is missing.
 */
export const RANGE_SCRIPT = `
local key = KEYS[1]
local min = ARGV[1]
local max = ARGV[2]
local offset = tonumber(ARGV[3])
local count = tonumber(ARGV[4])

local total = redis.call("ZCOUNT", key, min, max)
if total == 0 then
  return { 0, {} }
end

local keys = redis.call("ZRANGE", key, min, max, "BYSCORE", "LIMIT", offset, count)
if #keys == 0 then
  return { total, {} }
end

return { total, redis.call("MGET", unpack(keys)) }
`;

/**
 * Decoded reply of {@link RANGE_SCRIPT}
 */
export interface RangeReply {
  total: number;
  values: Array<Uint8Array | null>;
}

/**
 * Validate and decode a range script reply
 * @throws {UnexpectedScriptResultError} If the reply is not `[integer, array]`
 */
export function decodeRangeReply(reply: unknown): RangeReply {
  if (!Array.isArray(reply) || reply.length !== 2) {
    throw new UnexpectedScriptResultError(reply);
  }

  const [total, rawValues] = reply;
  if (typeof total !== "number" || !Number.isInteger(total) || !Array.isArray(rawValues)) {
    throw new UnexpectedScriptResultError(reply);
  }

  const values: Array<Uint8Array | null> = [];
  for (const raw of rawValues) {
    if (raw === null) {
      values.push(null);
    } else if (raw instanceof Uint8Array) {
      values.push(raw);
    } else if (typeof raw === "string") {
      values.push(Buffer.from(raw));
    } else {
      throw new UnexpectedScriptResultError(reply);
    }
  }

  return { total, values };
}

/**
 * Lazily registered script handle
 *
 * The first caller registers the body; concurrent callers await that same
 * registration. A failed registration is not cached, so the next call
 * tries again.
 */
export class ScriptHandle {
  #sha: string | undefined;
  #pending: Promise<string> | undefined;

  constructor(
    readonly body: string,
    private readonly register: (body: string) => Promise<string>
  ) {}

  /**
   * Current handle, registering the script first if needed
   */
  async get(): Promise<string> {
    if (this.#sha !== undefined) {
      return this.#sha;
    }

    this.#pending ??= this.#load();
    return this.#pending;
  }

  /**
   * Forget a handle the backend no longer knows
   * A newer handle loaded meanwhile is kept.
   */
  invalidate(sha: string): void {
    if (this.#sha === sha) {
      this.#sha = undefined;
    }
  }

  get loaded(): boolean {
    return this.#sha !== undefined;
  }

  async #load(): Promise<string> {
    try {
      const sha = await this.register(this.body);
      this.#sha = sha;
      return sha;
    } finally {
      this.#pending = undefined;
    }
  }
}
