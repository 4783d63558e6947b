import { describe, it, expect } from "vitest";
import { tokenize } from "./tokenize.js";

describe("tokenize", () => {
  it("should lower-case and split on punctuation and whitespace", () => {
    expect([...tokenize("Alien Gasper, (TRANSPARENT)!")]).toEqual([
      "alien",
      "gasper",
      "transparent",
    ]);
  });

  it("should keep underscores and hyphens inside words", () => {
    expect([...tokenize("f_alien_gasper half-life")]).toEqual(["f_alien_gasper", "half-life"]);
  });

  it("should drop single-character words", () => {
    expect([...tokenize("a b cd 7 42")]).toEqual(["cd", "42"]);
  });

  it("should measure the minimum length in UTF-8 bytes", () => {
    expect([...tokenize("\u5251 \u00e9 a \u{1D49C}")]).toEqual(["\u5251", "\u00e9", "\u{1D49C}"]);
  });

  it("should keep combining vowel signs inside words", () => {
    const hindi = "\u0939\u093F\u0902\u0926\u0940";
    expect([...tokenize(`${hindi} text`)]).toEqual([hindi, "text"]);
  });

  it("should deduplicate into a shared set", () => {
    const words = new Set<string>(["gun"]);
    const result = tokenize("GUN gun rifle", words);
    expect(result).toBe(words);
    expect([...words]).toEqual(["gun", "rifle"]);
  });

  it("should return an empty set for empty text", () => {
    expect(tokenize("").size).toBe(0);
    expect(tokenize("  ...  ").size).toBe(0);
  });
});
