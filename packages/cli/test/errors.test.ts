/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import { DatasetFormatError, DatasetNotFoundError } from "@gdfind/sdk";
import { CliError, mapErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should map a missing dataset to exit code 2", () => {
      expect(mapErrorToExitCode(new DatasetNotFoundError("all.json"))).toBe(2);
    });

    it("should map format errors to exit code 1", () => {
      expect(mapErrorToExitCode(new DatasetFormatError("all.json", ["data: Required"]))).toBe(1);
    });

    it("should use the exit code carried by CLI and commander errors", () => {
      expect(mapErrorToExitCode(new CliError("gone", { exitCode: 2 }))).toBe(2);
      expect(mapErrorToExitCode(new CommanderError(3, "commander.test", "boom"))).toBe(3);
    });

    it("should map unknown errors to exit code 1", () => {
      expect(mapErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
      expect(mapErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format Error objects", () => {
      expect(formatCliError(new Error("test message"))).toBe("test message");
    });

    it("should format non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause and stack in verbose mode", () => {
      const err = new Error("outer", { cause: "inner" });
      const formatted = formatCliError(err, true);
      expect(formatted.startsWith("outer\n  Cause: inner\n")).toBe(true);
      expect(formatted).toContain(err.stack ?? "");
    });

    it("should omit cause when not verbose", () => {
      expect(formatCliError(new Error("outer", { cause: "inner" }))).toBe("outer");
    });
  });
});
