import { describe, it, expect } from "vitest";
import { composeKey, indexKey, segmentsOf, DELIM_PIPE, DELIM_UNIT } from "./keys.js";

describe("keys", () => {
  describe("composeKey()", () => {
    it("should join namespace and segments with the delimiter", () => {
      expect(composeKey("orders", DELIM_PIPE, ["eu", "42"])).toBe("orders|eu|42");
    });

    it("should accept a single string id", () => {
      expect(composeKey("orders", DELIM_UNIT, "42")).toBe("orders\x1f42");
    });

    it("should end with the delimiter when there are no segments", () => {
      expect(composeKey("orders", DELIM_PIPE, [])).toBe("orders|");
    });

    it("should be deterministic", () => {
      const first = composeKey("ns", DELIM_UNIT, ["a", "b", "c"]);
      const second = composeKey("ns", DELIM_UNIT, ["a", "b", "c"]);
      expect(first).toBe(second);
    });

    it("should collide when a segment contains the delimiter", () => {
      // documented caller contract: segments must not contain the delimiter
      expect(composeKey("ns", DELIM_PIPE, ["a|b"])).toBe(composeKey("ns", DELIM_PIPE, ["a", "b"]));
    });

    it("should not collide across namespaces", () => {
      expect(composeKey("a", DELIM_PIPE, ["x"])).not.toBe(composeKey("b", DELIM_PIPE, ["x"]));
    });
  });

  describe("indexKey()", () => {
    it("should place the index under the namespace", () => {
      expect(indexKey("orders", DELIM_PIPE)).toBe("orders|lmIdx");
    });
  });

  describe("segmentsOf()", () => {
    it("should wrap a string id", () => {
      expect(segmentsOf("a")).toEqual(["a"]);
    });

    it("should pass segment lists through", () => {
      expect(segmentsOf(["a", "b"])).toEqual(["a", "b"]);
    });
  });
});
