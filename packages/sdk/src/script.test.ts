import { describe, it, expect, vi } from "vitest";
import { UnexpectedScriptResultError } from "./errors.js";
import { decodeRangeReply, RANGE_SCRIPT, ScriptHandle } from "./script.js";

describe("decodeRangeReply()", () => {
  it("should decode total and values", () => {
    const reply = decodeRangeReply([3, [Buffer.from("a"), null]]);

    expect(reply.total).toBe(3);
    expect(reply.values).toHaveLength(2);
    expect(Buffer.from(reply.values[0] ?? []).toString()).toBe("a");
    expect(reply.values[1]).toBeNull();
  });

  it("should decode an empty range", () => {
    expect(decodeRangeReply([0, []])).toEqual({ total: 0, values: [] });
  });

  it("should turn string values into bytes", () => {
    const { values } = decodeRangeReply([1, ["x"]]);
    expect(values[0]).toEqual(Buffer.from("x"));
  });

  it.each([
    ["null", null],
    ["a scalar", 7],
    ["a one-element array", [1]],
    ["a three-element array", [1, [], []]],
    ["a string total", ["1", []]],
    ["a fractional total", [1.5, []]],
    ["non-array values", [1, "x"]],
    ["numeric values", [1, [42]]],
  ])("should reject %s", (_label, reply) => {
    expect(() => decodeRangeReply(reply)).toThrow(UnexpectedScriptResultError);
  });
});

describe("ScriptHandle", () => {
  it("should register the body once and reuse the handle", async () => {
    const register = vi.fn(async (_body: string) => "sha-1");
    const handle = new ScriptHandle(RANGE_SCRIPT, register);

    expect(handle.loaded).toBe(false);
    expect(await handle.get()).toBe("sha-1");
    expect(await handle.get()).toBe("sha-1");
    expect(handle.loaded).toBe(true);
    expect(register).toHaveBeenCalledTimes(1);
    expect(register).toHaveBeenCalledWith(RANGE_SCRIPT);
  });

  it("should share one registration between concurrent callers", async () => {
    let resolve: (sha: string) => void = () => {};
    const register = vi.fn(
      () =>
        new Promise<string>((r) => {
          resolve = r;
        })
    );
    const handle = new ScriptHandle("return 1", register);

    const pending = Promise.all([handle.get(), handle.get(), handle.get()]);
    resolve("sha-shared");

    expect(await pending).toEqual(["sha-shared", "sha-shared", "sha-shared"]);
    expect(register).toHaveBeenCalledTimes(1);
  });

  it("should not cache a failed registration", async () => {
    const register = vi
      .fn<(body: string) => Promise<string>>()
      .mockRejectedValueOnce(new Error("LOADING"))
      .mockResolvedValueOnce("sha-2");
    const handle = new ScriptHandle("return 1", register);

    await expect(handle.get()).rejects.toThrow("LOADING");
    expect(handle.loaded).toBe(false);
    expect(await handle.get()).toBe("sha-2");
    expect(register).toHaveBeenCalledTimes(2);
  });

  it("should register again after invalidating the current handle", async () => {
    const register = vi
      .fn<(body: string) => Promise<string>>()
      .mockResolvedValueOnce("sha-old")
      .mockResolvedValueOnce("sha-new");
    const handle = new ScriptHandle("return 1", register);

    expect(await handle.get()).toBe("sha-old");
    handle.invalidate("sha-old");
    expect(await handle.get()).toBe("sha-new");
  });

  it("should ignore invalidation of a stale handle", async () => {
    const register = vi.fn(async () => "sha-current");
    const handle = new ScriptHandle("return 1", register);

    await handle.get();
    handle.invalidate("sha-stale");

    expect(handle.loaded).toBe(true);
    expect(register).toHaveBeenCalledTimes(1);
  });
});
