/**
 * Backend contract: the subset of a score-ordered key/value server
 * (Redis or compatible) the store relies on.
 *
 * Score bounds are passed as strings so open bounds ("-inf", "+inf") and
 * nanosecond scores beyond Number.MAX_SAFE_INTEGER travel unchanged.
 */

/**
 * Commands queued for atomic execution (MULTI ... EXEC)
 */
export interface Transaction {
  set(key: string, value: Uint8Array): this;
  zadd(key: string, score: string, member: string): this;
  del(key: string): this;
  zrem(key: string, member: string): this;
  /**
   * Execute all queued commands as one unit
   * @returns One reply per queued command, in queue order
   * @throws If the unit or any of its commands failed
   */
  exec(): Promise<unknown[]>;
}

export interface Backend {
  get(key: string): Promise<Uint8Array | null>;
  /** Values for every key, `null` where a key is absent */
  mget(keys: readonly string[]): Promise<Array<Uint8Array | null>>;
  /** Number of the given keys that exist */
  exists(key: string): Promise<number>;
  zcount(key: string, min: string, max: string): Promise<number>;
  /** Members with score in [min, max], ascending, after skipping `offset` */
  zrangeByScore(
    key: string,
    min: string,
    max: string,
    offset: number,
    count: number
  ): Promise<string[]>;
  /** Register a script body; returns its handle (SHA-1 of the body) */
  scriptLoad(body: string): Promise<string>;
  /** Run a registered script; rejects with a NOSCRIPT error for unknown handles */
  evalsha(sha: string, keys: readonly string[], args: ReadonlyArray<string | number>): Promise<unknown>;
  transaction(): Transaction;
  close(): Promise<void>;
}

/**
 * True for the error a backend raises when a script handle is unknown
 * (never loaded, or dropped by SCRIPT FLUSH / a server restart)
 */
export function isNoScriptError(err: unknown): boolean {
  return err instanceof Error && err.message.startsWith("NOSCRIPT");
}
