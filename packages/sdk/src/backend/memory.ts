/**
 * In-process backend with Redis string and sorted-set semantics
 *
 * Meant for tests and local tooling. Transactions are queued and applied
 * in one synchronous step, which makes them atomic with respect to every
 * other caller in the process. Scripts are registered by the SHA-1 of their
 * body, like Redis; only bodies with a native procedure can be evaluated.
 */

import { createHash } from "node:crypto";
import { RANGE_SCRIPT } from "../script.js";
import type { Backend, Transaction } from "./types.js";

/**
 * Native stand-in for a server-side script
 */
export type Procedure = (
  backend: MemoryBackend,
  keys: readonly string[],
  args: ReadonlyArray<string | number>
) => unknown;

/**
 * Command names accepted by {@link MemoryBackend.failNext}
 */
export type MemoryCommand =
  | "get"
  | "mget"
  | "exists"
  | "zcount"
  | "zrangeByScore"
  | "scriptLoad"
  | "evalsha"
  | "exec";

export interface MemoryBackendOptions {
  /** Extra script bodies the backend can evaluate, besides the range script */
  procedures?: ReadonlyMap<string, Procedure>;
}

interface ScoredMember {
  member: string;
  score: number;
}

type Entry = { kind: "string"; value: Buffer } | { kind: "zset"; set: SortedSet };

/**
 * Sorted set ordered by score, then member (byte order), as Redis does
 */
export class SortedSet {
  #scores = new Map<string, number>();
  #sorted: ScoredMember[] = [];

  get size(): number {
    return this.#sorted.length;
  }

  /**
   * Insert or update a member
   * @returns 1 if the member was added, 0 if it already existed
   */
  add(member: string, score: number): 0 | 1 {
    const previous = this.#scores.get(member);
    if (previous !== undefined) {
      if (previous === score) {
        return 0;
      }
      this.#sorted.splice(this.#position(member, previous), 1);
    }

    this.#scores.set(member, score);
    this.#sorted.splice(this.#insertionPoint(member, score), 0, { member, score });
    return previous === undefined ? 1 : 0;
  }

  /**
   * @returns 1 if the member was removed, 0 if it was absent
   */
  remove(member: string): 0 | 1 {
    const score = this.#scores.get(member);
    if (score === undefined) {
      return 0;
    }
    this.#sorted.splice(this.#position(member, score), 1);
    this.#scores.delete(member);
    return 1;
  }

  score(member: string): number | undefined {
    return this.#scores.get(member);
  }

  /**
   * Members with `min <= score <= max`, ascending
   */
  rangeByScore(min: number, max: number, offset = 0, count = -1): string[] {
    const start = this.#lowerBound(min) + offset;
    const end = this.#upperBound(max);
    const stop = count < 0 ? end : Math.min(end, start + count);

    const members: string[] = [];
    for (let i = start; i < stop; i++) {
      const entry = this.#sorted[i];
      if (entry) members.push(entry.member);
    }
    return members;
  }

  count(min: number, max: number): number {
    return Math.max(0, this.#upperBound(max) - this.#lowerBound(min));
  }

  /** First index with score >= min */
  #lowerBound(min: number): number {
    let lo = 0;
    let hi = this.#sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((this.#sorted[mid]?.score ?? Infinity) < min) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** First index with score > max */
  #upperBound(max: number): number {
    let lo = 0;
    let hi = this.#sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if ((this.#sorted[mid]?.score ?? Infinity) <= max) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  #insertionPoint(member: string, score: number): number {
    let lo = 0;
    let hi = this.#sorted.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.#sorted[mid];
      if (entry && compare(entry, { member, score }) < 0) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  #position(member: string, score: number): number {
    return this.#insertionPoint(member, score);
  }
}

function compare(a: ScoredMember, b: ScoredMember): number {
  if (a.score !== b.score) {
    return a.score < b.score ? -1 : 1;
  }
  if (a.member === b.member) {
    return 0;
  }
  return Buffer.compare(Buffer.from(a.member), Buffer.from(b.member));
}

/**
 * Parse a score bound: "-inf", "+inf", "inf" or a number
 */
export function parseScore(bound: string): number {
  switch (bound) {
    case "-inf":
      return -Infinity;
    case "+inf":
    case "inf":
      return Infinity;
  }

  const score = Number(bound);
  if (bound.trim() === "" || Number.isNaN(score)) {
    throw new Error("ERR min or max is not a float");
  }
  return score;
}

function wrongType(): Error {
  return new Error("WRONGTYPE Operation against a key holding the wrong kind of value");
}

/**
 * Native version of the range script
 */
const rangeProcedure: Procedure = (backend, keys, args) => {
  const [key] = keys;
  const [min, max, offset, count] = args;
  if (key === undefined || min === undefined || max === undefined) {
    throw new Error("ERR wrong number of arguments for range script");
  }

  const set = backend.sortedSet(key);
  const low = parseScore(String(min));
  const high = parseScore(String(max));

  const total = set?.count(low, high) ?? 0;
  if (!set || total === 0) {
    return [0, []];
  }

  const members = set.rangeByScore(low, high, Number(offset ?? 0), Number(count ?? -1));
  if (members.length === 0) {
    return [total, []];
  }

  return [total, backend.valuesOf(members)];
};

export class MemoryBackend implements Backend {
  #data = new Map<string, Entry>();
  #scripts = new Map<string, string>();
  #procedures: Map<string, Procedure>;
  #failures = new Map<MemoryCommand, Error>();
  #calls = new Map<MemoryCommand, number>();
  #closed = false;

  constructor(options: MemoryBackendOptions = {}) {
    this.#procedures = new Map<string, Procedure>(options.procedures);
    this.#procedures.set(RANGE_SCRIPT, rangeProcedure);
  }

  async get(key: string): Promise<Uint8Array | null> {
    this.#enter("get");
    return this.#readString(key);
  }

  async mget(keys: readonly string[]): Promise<Array<Uint8Array | null>> {
    this.#enter("mget");
    return this.valuesOf(keys);
  }

  async exists(key: string): Promise<number> {
    this.#enter("exists");
    return this.#data.has(key) ? 1 : 0;
  }

  async zcount(key: string, min: string, max: string): Promise<number> {
    this.#enter("zcount");
    return this.sortedSet(key)?.count(parseScore(min), parseScore(max)) ?? 0;
  }

  async zrangeByScore(
    key: string,
    min: string,
    max: string,
    offset: number,
    count: number
  ): Promise<string[]> {
    this.#enter("zrangeByScore");
    return (
      this.sortedSet(key)?.rangeByScore(parseScore(min), parseScore(max), offset, count) ?? []
    );
  }

  async scriptLoad(body: string): Promise<string> {
    this.#enter("scriptLoad");
    const sha = createHash("sha1").update(body).digest("hex");
    this.#scripts.set(sha, body);
    return sha;
  }

  async evalsha(
    sha: string,
    keys: readonly string[],
    args: ReadonlyArray<string | number>
  ): Promise<unknown> {
    this.#enter("evalsha");
    const body = this.#scripts.get(sha);
    if (body === undefined) {
      throw new Error("NOSCRIPT No matching script. Please use EVAL.");
    }

    const procedure = this.#procedures.get(body);
    if (!procedure) {
      throw new Error("ERR script has no native procedure in the memory backend");
    }
    return procedure(this, keys, args);
  }

  transaction(): Transaction {
    return new MemoryTransaction(this);
  }

  async close(): Promise<void> {
    this.#closed = true;
  }

  /**
   * Make the next call of `command` reject with `error`
   */
  failNext(command: MemoryCommand, error: Error): void {
    this.#failures.set(command, error);
  }

  /**
   * Number of times `command` has been called
   */
  calls(command: MemoryCommand): number {
    return this.#calls.get(command) ?? 0;
  }

  /**
   * Drop every registered script, like SCRIPT FLUSH
   */
  flushScripts(): void {
    this.#scripts.clear();
  }

  /**
   * Drop every key, like FLUSHDB
   */
  flush(): void {
    this.#data.clear();
  }

  get closed(): boolean {
    return this.#closed;
  }

  /** Number of keys, sorted sets included */
  get size(): number {
    return this.#data.size;
  }

  /**
   * Sorted set at `key`, if any
   * @throws If `key` holds a string
   */
  sortedSet(key: string): SortedSet | undefined {
    const entry = this.#data.get(key);
    if (!entry) return undefined;
    if (entry.kind !== "zset") throw wrongType();
    return entry.set;
  }

  /**
   * String values for `keys`; `null` for absent keys and non-string keys, as MGET
   */
  valuesOf(keys: readonly string[]): Array<Uint8Array | null> {
    return keys.map((key) => {
      const entry = this.#data.get(key);
      return entry?.kind === "string" ? Buffer.from(entry.value) : null;
    });
  }

  /**
   * Apply queued transaction commands. Validation runs first so a failing
   * command leaves the data untouched.
   * @internal
   */
  applyTransaction(commands: ReadonlyArray<QueuedCommand>): unknown[] {
    this.#enter("exec");

    for (const command of commands) {
      if (command.name === "zadd") {
        parseScore(command.score);
      }
      const entry = this.#data.get(command.key);
      const expects = command.name === "zadd" || command.name === "zrem" ? "zset" : "string";
      if (entry && command.name !== "set" && command.name !== "del" && entry.kind !== expects) {
        throw new Error(`EXECABORT Transaction discarded because of: ${wrongType().message}`);
      }
    }

    return commands.map((command) => {
      switch (command.name) {
        case "set":
          this.#data.set(command.key, { kind: "string", value: Buffer.from(command.value) });
          return "OK";
        case "del":
          return this.#data.delete(command.key) ? 1 : 0;
        case "zadd": {
          let set = this.sortedSet(command.key);
          if (!set) {
            set = new SortedSet();
            this.#data.set(command.key, { kind: "zset", set });
          }
          return set.add(command.member, parseScore(command.score));
        }
        case "zrem": {
          const set = this.sortedSet(command.key);
          if (!set) return 0;
          const removed = set.remove(command.member);
          if (set.size === 0) this.#data.delete(command.key);
          return removed;
        }
      }
    });
  }

  #readString(key: string): Buffer | null {
    const entry = this.#data.get(key);
    if (!entry) return null;
    if (entry.kind !== "string") throw wrongType();
    return Buffer.from(entry.value);
  }

  #enter(command: MemoryCommand): void {
    if (this.#closed) {
      throw new Error("Connection is closed.");
    }
    this.#calls.set(command, (this.#calls.get(command) ?? 0) + 1);

    const failure = this.#failures.get(command);
    if (failure) {
      this.#failures.delete(command);
      throw failure;
    }
  }
}

/** @internal */
export type QueuedCommand =
  | { name: "set"; key: string; value: Uint8Array }
  | { name: "del"; key: string }
  | { name: "zadd"; key: string; score: string; member: string }
  | { name: "zrem"; key: string; member: string };

class MemoryTransaction implements Transaction {
  #commands: QueuedCommand[] = [];

  constructor(private readonly backend: MemoryBackend) {}

  set(key: string, value: Uint8Array): this {
    // Copy now: MULTI sends the bytes when the command is queued
    this.#commands.push({ name: "set", key, value: Uint8Array.from(value) });
    return this;
  }

  zadd(key: string, score: string, member: string): this {
    this.#commands.push({ name: "zadd", key, score, member });
    return this;
  }

  del(key: string): this {
    this.#commands.push({ name: "del", key });
    return this;
  }

  zrem(key: string, member: string): this {
    this.#commands.push({ name: "zrem", key, member });
    return this;
  }

  async exec(): Promise<unknown[]> {
    return this.backend.applyTransaction(this.#commands);
  }
}
