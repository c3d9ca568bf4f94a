import { describe, it, expect } from "vitest";
import { ok, err, unwrap, unwrapOr, map, mapErr, andThen, all, tryCatch, tryCatchAsync } from "@/lib/result.js";
import type { Result } from "@/lib/result.js";

describe("Result", () => {
  describe("ok", () => {
    it("creates successful result", () => {
      const result = ok(42);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toBe(42);
      }
    });
  });

  describe("err", () => {
    it("creates failed result", () => {
      const error = new Error("test error");
      const result = err(error);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBe(error);
      }
    });
  });

  describe("unwrap", () => {
    it("returns data for successful result", () => {
      expect(unwrap(ok(42))).toBe(42);
    });

    it("throws for failed result", () => {
      expect(() => unwrap(err(new Error("test")))).toThrow("test");
    });

    it("wraps non-Error failures when throwing", () => {
      expect(() => unwrap(err("plain"))).toThrow("plain");
    });
  });

  describe("unwrapOr", () => {
    it("returns data for successful result", () => {
      expect(unwrapOr(ok(42), 0)).toBe(42);
    });

    it("returns default for failed result", () => {
      const result: Result<number, Error> = err(new Error("test"));
      expect(unwrapOr(result, 0)).toBe(0);
    });
  });

  describe("map", () => {
    it("transforms successful result", () => {
      const mapped = map(ok(21), (x) => x * 2);
      expect(unwrap(mapped)).toBe(42);
    });

    it("passes through failed result", () => {
      const result: Result<number, Error> = err(new Error("test"));
      const mapped = map(result, (x) => x * 2);
      expect(mapped.success).toBe(false);
    });
  });

  describe("mapErr", () => {
    it("transforms failed result error", () => {
      const result: Result<number, string> = err("error");
      const mapped = mapErr(result, (e) => new Error(e));
      expect(mapped.success).toBe(false);
      if (!mapped.success) {
        expect(mapped.error.message).toBe("error");
      }
    });

    it("passes through successful result", () => {
      const mapped = mapErr(ok(42), (e) => new Error(String(e)));
      expect(unwrap(mapped)).toBe(42);
    });
  });

  describe("andThen", () => {
    it("chains successful results", () => {
      const chained = andThen(ok(21), (x) => ok(x * 2));
      expect(unwrap(chained)).toBe(42);
    });

    it("short-circuits on error", () => {
      const result: Result<number, Error> = err(new Error("first"));
      const chained = andThen(result, (x) => ok(x * 2));
      expect(chained.success).toBe(false);
    });

    it("propagates error from chain", () => {
      const chained = andThen(ok(21), () => err(new Error("chain error")));
      expect(chained.success).toBe(false);
    });
  });

  describe("all", () => {
    it("combines successful results", () => {
      const combined = all([ok(1), ok(2), ok(3)]);
      expect(unwrap(combined)).toEqual([1, 2, 3]);
    });

    it("returns first error", () => {
      const first = new Error("first");
      const results: Result<number, Error>[] = [ok(1), err(first), err(new Error("second"))];
      const combined = all(results);
      expect(combined.success).toBe(false);
      if (!combined.success) {
        expect(combined.error).toBe(first);
      }
    });

    it("combines an empty list", () => {
      expect(unwrap(all([]))).toEqual([]);
    });
  });

  describe("tryCatch", () => {
    it("wraps successful function", () => {
      expect(unwrap(tryCatch(() => 42))).toBe(42);
    });

    it("catches thrown error", () => {
      const result = tryCatch(() => {
        throw new Error("thrown");
      });
      expect(result.success).toBe(false);
    });

    it("wraps non-Error throws", () => {
      const result = tryCatch(() => {
        throw "string error";
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("string error");
      }
    });
  });

  describe("tryCatchAsync", () => {
    it("wraps successful async function", async () => {
      const result = await tryCatchAsync(async () => 42);
      expect(unwrap(result)).toBe(42);
    });

    it("catches rejected promise", async () => {
      const result = await tryCatchAsync(async () => {
        throw new Error("async error");
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("async error");
      }
    });
  });
});
