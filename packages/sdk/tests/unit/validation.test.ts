import { describe, expect, it } from "vitest";
import {
  isUuid,
  validateResourceRef,
  validateWaitTimeout,
} from "../../src/utils/validation.js";

describe("Validation", () => {
  describe("isUuid", () => {
    it("should accept a version 4 UUID", () => {
      expect(isUuid("6f1c2a8e-3b4d-4c5e-9f60-7a8b9c0d1e2f")).toBe(true);
    });

    it("should accept upper case", () => {
      expect(isUuid("6F1C2A8E-3B4D-4C5E-9F60-7A8B9C0D1E2F")).toBe(true);
    });

    it("should accept a time-based version 1 UUID", () => {
      expect(isUuid("9c2e4a10-5b7d-11ee-8c99-0242ac120002")).toBe(true);
    });

    it("should reject an unknown version", () => {
      expect(isUuid("6f1c2a8e-3b4d-0c5e-9f60-7a8b9c0d1e2f")).toBe(false);
    });

    it("should reject a wrong variant", () => {
      expect(isUuid("6f1c2a8e-3b4d-4c5e-cf60-7a8b9c0d1e2f")).toBe(false);
    });

    it("should reject names", () => {
      expect(isUuid("edge-1")).toBe(false);
    });
  });

  describe("validateWaitTimeout", () => {
    it("should accept positive integers", () => {
      expect(validateWaitTimeout(600)).toEqual({ valid: true });
    });

    it("should reject zero", () => {
      expect(validateWaitTimeout(0)).toEqual({
        valid: false,
        error: "Timeout must be positive, got 0",
      });
    });

    it("should reject negative values", () => {
      expect(validateWaitTimeout(-5).valid).toBe(false);
    });

    it("should reject fractions", () => {
      expect(validateWaitTimeout(1.5)).toEqual({
        valid: false,
        error: "Timeout must be an integer number of seconds, got 1.5",
      });
    });

    it("should reject NaN", () => {
      expect(validateWaitTimeout(Number.NaN).valid).toBe(false);
    });

    it("should warn about budgets longer than a day", () => {
      expect(validateWaitTimeout(90000)).toEqual({
        valid: true,
        warnings: ["Timeout of 90000s exceeds one day"],
      });
    });
  });

  describe("validateResourceRef", () => {
    it("should accept names", () => {
      expect(validateResourceRef("edge-1").valid).toBe(true);
    });

    it("should reject blank references", () => {
      expect(validateResourceRef("  ")).toEqual({
        valid: false,
        error: "Resource name or id must not be empty",
      });
    });

    it("should reject path separators", () => {
      expect(validateResourceRef("a/b")).toEqual({
        valid: false,
        error: "Resource name or id must not contain '/': a/b",
      });
    });
  });
});
