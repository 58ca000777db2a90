import { describe, it, expect } from "vitest";
import {
  InvalidOptionsError,
  OperationAbortedError,
  PageFetchError,
  ScriptLoadError,
  StoreOperationError,
  TimeKVError,
  UnexpectedScriptResultError,
} from "./errors.js";

describe("errors", () => {
  describe("StoreOperationError", () => {
    it("should name the operation and chain the cause message", () => {
      const cause = new Error("connection refused");
      const err = new StoreOperationError("set", "failed to set entity", { cause });

      expect(err).toBeInstanceOf(TimeKVError);
      expect(err.message).toBe("failed to set entity: connection refused");
      expect(err.operation).toBe("set");
      expect(err.code).toBe("STORE_ERROR");
      expect(err.name).toBe("StoreOperationError");
      expect(err.cause).toBe(cause);
    });

    it("should keep the message as is without a cause", () => {
      expect(new StoreOperationError("get", "failed to get entity").message).toBe(
        "failed to get entity"
      );
    });
  });

  describe("ScriptLoadError", () => {
    it("should chain the registration failure", () => {
      const err = new ScriptLoadError({ cause: new Error("NOPERM") });
      expect(err.message).toBe("failed to load range script: NOPERM");
      expect(err.code).toBe("SCRIPT_LOAD_ERROR");
    });
  });

  describe("UnexpectedScriptResultError", () => {
    it("should keep the offending reply", () => {
      const err = new UnexpectedScriptResultError(["only-one"]);
      expect(err.message).toBe("unexpected result from range script");
      expect(err.reply).toEqual(["only-one"]);
      expect(err.code).toBe("E_SCRIPT_RESULT");
    });
  });

  describe("PageFetchError", () => {
    it("should record the offset of the failed page", () => {
      const err = new PageFetchError("fetching next page failed", 4, { cause: new Error("boom") });
      expect(err.message).toBe("fetching next page failed: boom");
      expect(err.offset).toBe(4);
      expect(err.code).toBe("PAGE_FETCH_ERROR");
    });
  });

  describe("InvalidOptionsError", () => {
    it("should list every issue", () => {
      const err = new InvalidOptionsError(["namespace: namespace must be non-empty", "limit must be > 0"]);
      expect(err.message).toBe(
        "Invalid options: namespace: namespace must be non-empty; limit must be > 0"
      );
      expect(err.issues).toHaveLength(2);
    });
  });

  describe("OperationAbortedError", () => {
    it("should name the aborted operation", () => {
      const err = new OperationAbortedError("fetchPage", { cause: "shutdown" });
      expect(err.message).toBe("fetchPage aborted");
      expect(err.code).toBe("ABORTED");
      expect(err.cause).toBe("shutdown");
    });
  });
});
