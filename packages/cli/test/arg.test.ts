/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { joinQuery, parseNonNegativeInt } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid positive integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt("1", "test")).toBe(1);
      expect(parseNonNegativeInt("100", "test")).toBe(100);
      expect(parseNonNegativeInt("9999", "test")).toBe(9999);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-100", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject NaN", () => {
      expect(() => parseNonNegativeInt("abc", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject values > 10000", () => {
      expect(() => parseNonNegativeInt("10001", "test")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("100000", "test")).toThrow("must be <= 10000");
    });

    it("should allow exactly 10000", () => {
      expect(parseNonNegativeInt("10000", "test")).toBe(10000);
    });
  });

  describe("joinQuery", () => {
    it("should join variadic words with spaces", () => {
      expect(joinQuery(["t:gun", "rifle"])).toBe("t:gun rifle");
    });

    it("should keep quoted phrases passed as one argument", () => {
      expect(joinQuery(["name:'gasping tube'", "c:furniture"])).toBe(
        "name:'gasping tube' c:furniture"
      );
    });

    it("should return an empty query for no words", () => {
      expect(joinQuery([])).toBe("");
      expect(joinQuery([" ", ""])).toBe("");
    });
  });
});
