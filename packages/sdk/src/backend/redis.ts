/**
 * Redis backend over ioredis
 */

import { Redis, type RedisOptions } from "ioredis";
import type { Backend, Transaction } from "./types.js";

export const DEFAULT_REDIS_URL = "redis://127.0.0.1:6379";

/**
 * The ioredis commands the backend sends
 *
 * An ioredis `Redis` instance satisfies it; so does any client with the same
 * command methods.
 */
export interface RedisClient {
  getBuffer(key: string): Promise<Buffer | null>;
  mgetBuffer(keys: string[]): Promise<Array<Buffer | null>>;
  exists(key: string): Promise<number>;
  zcount(key: string, min: string, max: string): Promise<number>;
  zrangebyscore(
    key: string,
    min: string,
    max: string,
    limit: "LIMIT",
    offset: number,
    count: number
  ): Promise<string[]>;
  script(subcommand: "LOAD", body: string): Promise<unknown>;
  callBuffer(command: string, ...args: Array<string | number>): Promise<unknown>;
  multi(): RedisMulti;
  quit(): Promise<unknown>;
}

/**
 * A queued MULTI block
 */
export interface RedisMulti {
  set(key: string, value: Buffer): RedisMulti;
  zadd(key: string, score: string, member: string): RedisMulti;
  del(key: string): RedisMulti;
  zrem(key: string, member: string): RedisMulti;
  exec(): Promise<Array<[error: Error | null, reply: unknown]> | null>;
}

/**
 * Backend talking to a Redis (6.2+) server
 *
 * Reads use the Buffer variants of the commands so payloads come back as
 * bytes, never decoded as UTF-8.
 *
 * @example
 * ```typescript
 * const backend = new RedisBackend("redis://localhost:6379/2");
 * // or share an existing client; close() then leaves it open
 * const shared = new RedisBackend(new Redis({ host: "cache" }));
 * ```
 */
export class RedisBackend implements Backend {
  readonly client: RedisClient;
  readonly #owned: boolean;

  constructor(connection: string | RedisClient = DEFAULT_REDIS_URL, options: RedisOptions = {}) {
    if (typeof connection === "string") {
      this.client = new Redis(connection, options);
      this.#owned = true;
    } else {
      this.client = connection;
      this.#owned = false;
    }
  }

  get(key: string): Promise<Uint8Array | null> {
    return this.client.getBuffer(key);
  }

  mget(keys: readonly string[]): Promise<Array<Uint8Array | null>> {
    return this.client.mgetBuffer([...keys]);
  }

  exists(key: string): Promise<number> {
    return this.client.exists(key);
  }

  zcount(key: string, min: string, max: string): Promise<number> {
    return this.client.zcount(key, min, max);
  }

  zrangeByScore(
    key: string,
    min: string,
    max: string,
    offset: number,
    count: number
  ): Promise<string[]> {
    return this.client.zrangebyscore(key, min, max, "LIMIT", offset, count);
  }

  async scriptLoad(body: string): Promise<string> {
    const sha: unknown = await this.client.script("LOAD", body);
    if (typeof sha !== "string") {
      throw new Error(`SCRIPT LOAD replied with ${typeof sha}, expected a SHA string`);
    }
    return sha;
  }

  evalsha(
    sha: string,
    keys: readonly string[],
    args: ReadonlyArray<string | number>
  ): Promise<unknown> {
    return this.client.callBuffer("EVALSHA", sha, keys.length, ...keys, ...args);
  }

  transaction(): Transaction {
    return new RedisTransaction(this.client.multi());
  }

  /**
   * Quit the connection if this backend opened it
   */
  async close(): Promise<void> {
    if (this.#owned) {
      await this.client.quit();
    }
  }
}

class RedisTransaction implements Transaction {
  constructor(private readonly pipeline: RedisMulti) {}

  set(key: string, value: Uint8Array): this {
    this.pipeline.set(key, toBuffer(value));
    return this;
  }

  zadd(key: string, score: string, member: string): this {
    this.pipeline.zadd(key, score, member);
    return this;
  }

  del(key: string): this {
    this.pipeline.del(key);
    return this;
  }

  zrem(key: string, member: string): this {
    this.pipeline.zrem(key, member);
    return this;
  }

  async exec(): Promise<unknown[]> {
    return unwrapExecResult(await this.pipeline.exec());
  }
}

/**
 * Replies of an EXEC, or the first error in it
 *
 * ioredis resolves EXEC with `[error, reply]` pairs, or null when the
 * transaction was discarded.
 */
export function unwrapExecResult(
  result: Array<[error: Error | null, reply: unknown]> | null
): unknown[] {
  if (result === null) {
    throw new Error("EXEC returned null: transaction discarded");
  }

  return result.map(([error, reply]) => {
    if (error) {
      throw error;
    }
    return reply;
  });
}

function toBuffer(value: Uint8Array): Buffer {
  return Buffer.isBuffer(value)
    ? value
    : Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}
