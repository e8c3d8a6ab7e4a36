import { describe, it, expect } from "vitest";
import { ok, err, unwrap, unwrapOr } from "@/lib/result.js";
import { NotFoundError } from "@/lib/errors.js";
import type { Result } from "@/lib/result.js";

describe("Result", () => {
  describe("ok", () => {
    it("creates successful result", () => {
      const result = ok(3);
      expect(result).toEqual({ success: true, data: 3 });
    });
  });

  describe("err", () => {
    it("creates failed result", () => {
      const error = new NotFoundError("No model version registered", "version");
      const result = err(error);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBe(error);
      }
    });
  });

  describe("unwrap", () => {
    it("returns data for successful result", () => {
      expect(unwrap(ok("v2"))).toBe("v2");
    });

    it("throws the carried error for failed result", () => {
      const result: Result<number, NotFoundError> = err(
        new NotFoundError("Metrics for model v9 not found", "metrics", 9)
      );
      expect(() => unwrap(result)).toThrow(NotFoundError);
      expect(() => unwrap(result)).toThrow("Metrics for model v9 not found");
    });
  });

  describe("unwrapOr", () => {
    it("returns data for successful result", () => {
      expect(unwrapOr(ok(4), 1)).toBe(4);
    });

    it("returns default for failed result", () => {
      const result: Result<number, NotFoundError> = err(new NotFoundError("missing", "version"));
      expect(unwrapOr(result, 1)).toBe(1);
    });
  });
});
