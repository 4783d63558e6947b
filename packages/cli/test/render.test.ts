/**
 * Unit tests for output rendering
 */

import { describe, it, expect } from "vitest";
import { createRecord } from "@gdfind/sdk";
import {
  colorize,
  formatMs,
  formatProgress,
  formatRecordLine,
  printJson,
  printLines,
  summarizeRecord,
} from "../src/lib/render.js";

function collect(): { write: (text: string) => void; text: () => string } {
  let buffer = "";
  return {
    write: (text) => {
      buffer += text;
    },
    text: () => buffer,
  };
}

describe("render", () => {
  describe("formatRecordLine", () => {
    it("should prefix the display name with the type", () => {
      expect(formatRecordLine(createRecord({ abstract: "base_gun", type: "GUN" }))).toBe(
        "GUN (abs) base_gun"
      );
      expect(
        formatRecordLine(createRecord({ type: "recipe", result: "rifle_223", id_suffix: "makeshift" }))
      ).toBe("recipe result: rifle_223 (suffix: makeshift)");
    });

    it("should print only the name for untyped records", () => {
      expect(formatRecordLine(createRecord({ name: "Loose entry" }))).toBe("Loose entry");
    });
  });

  describe("summarizeRecord", () => {
    it("should carry position, id, type and label", () => {
      expect(summarizeRecord(3, createRecord({ id: "f_alien_gasper", type: "furniture" }))).toEqual({
        index: 3,
        id: "f_alien_gasper",
        type: "furniture",
        name: "f_alien_gasper",
      });
    });
  });

  describe("formatProgress", () => {
    it("should redraw a padded percentage", () => {
      expect(formatProgress("Indexing", 0.08)).toBe("\rIndexing   8%");
      expect(formatProgress("Indexing", 1)).toBe("\rIndexing 100%");
    });

    it("should clamp out-of-range ratios", () => {
      expect(formatProgress("Indexing", -1)).toBe("\rIndexing   0%");
      expect(formatProgress("Indexing", 2)).toBe("\rIndexing 100%");
    });
  });

  describe("formatMs", () => {
    it("should switch to seconds at one second", () => {
      expect(formatMs(12.5)).toBe("12.50 ms");
      expect(formatMs(1500)).toBe("1.50 s");
    });
  });

  describe("colorize", () => {
    it("should color only terminal output", () => {
      expect(colorize("error", "red", false)).toBe("error");
      expect(colorize("error", "red", true)).toBe("\x1b[31merror\x1b[0m");
    });
  });

  describe("printJson", () => {
    it("should pretty-print by default and compact with raw", () => {
      const pretty = collect();
      printJson(pretty.write, { a: 1 });
      expect(pretty.text()).toBe('{\n  "a": 1\n}\n');

      const raw = collect();
      printJson(raw.write, { a: 1 }, { raw: true });
      expect(raw.text()).toBe('{"a":1}\n');
    });
  });

  describe("printLines", () => {
    it("should end every line with a newline", () => {
      const out = collect();
      printLines(out.write, ["one", "two"]);
      expect(out.text()).toBe("one\ntwo\n");
    });
  });
});
