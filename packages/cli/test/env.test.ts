/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { isVerbose, resolveDataFile } from "../src/lib/env.js";

describe("environment resolution", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("resolveDataFile", () => {
    it("should use CLI option when provided", () => {
      vi.stubEnv("GDFIND_DATA_FILE", "/env/data.json");
      expect(resolveDataFile("/cli/data.json")).toBe(path.resolve("/cli/data.json"));
    });

    it("should use GDFIND_DATA_FILE when CLI option not provided", () => {
      vi.stubEnv("GDFIND_DATA_FILE", "/env/data.json");
      expect(resolveDataFile()).toBe(path.resolve("/env/data.json"));
    });

    it("should default to all.json in the working directory", () => {
      delete process.env.GDFIND_DATA_FILE;
      expect(resolveDataFile()).toBe(path.resolve("all.json"));
    });

    it("should resolve relative paths", () => {
      expect(resolveDataFile("./exports/items.json")).toBe(path.resolve("exports/items.json"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveDataFile("~/data/all.json")).toBe(path.join(homedir(), "data/all.json"));
      expect(resolveDataFile("~")).toBe(homedir());
    });

    it("should leave ~user paths alone", () => {
      expect(resolveDataFile("~someone/all.json")).toBe(path.resolve("~someone/all.json"));
    });
  });

  describe("isVerbose", () => {
    it("should be enabled only by GDFIND_CLI_DEBUG=1", () => {
      vi.stubEnv("GDFIND_CLI_DEBUG", "1");
      expect(isVerbose()).toBe(true);
      vi.stubEnv("GDFIND_CLI_DEBUG", "true");
      expect(isVerbose()).toBe(false);
    });
  });
});
