/**
 * Unit tests for command timing metrics
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { metrics } from "@gdfind/sdk";
import { emitMetric, withTiming } from "../src/lib/telemetry.js";

describe("telemetry", () => {
  beforeEach(() => {
    metrics.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should stay silent unless GDFIND_CLI_DEBUG=1", () => {
    const write = vi.fn();
    vi.stubEnv("GDFIND_CLI_DEBUG", "");
    emitMetric("cli.search", { duration_ms: 5 }, write);
    expect(write).not.toHaveBeenCalled();
  });

  it("should write one sanitized metric line", () => {
    const write = vi.fn();
    vi.stubEnv("GDFIND_CLI_DEBUG", "1");
    emitMetric("cli.search", { duration_ms: 5, query: "t:gun\nrifle" }, write);
    expect(write).toHaveBeenCalledWith("metric cli.search duration_ms=5 query=t:gun rifle\n");
  });

  it("should report command counts and search metrics", async () => {
    const write = vi.fn();
    vi.stubEnv("GDFIND_CLI_DEBUG", "1");

    const result = await withTiming(
      "cli.search",
      async (fields) => {
        fields.records = 5;
        fields.matches = 2;
        metrics.recordFastPath();
        metrics.recordFastPath();
        metrics.recordSlowPath();
        metrics.recordQuery(4.256);
        return "done";
      },
      write
    );

    expect(result).toBe("done");
    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toMatch(
      /^metric cli\.search duration_ms=\d+ success=true records=5 matches=2 fast_path_rate=0\.67 query_p95_ms=4\.26\n$/
    );
  });

  it("should record failures and rethrow", async () => {
    const write = vi.fn();
    vi.stubEnv("GDFIND_CLI_DEBUG", "1");

    await expect(
      withTiming(
        "cli.show",
        async () => {
          throw new Error("boom");
        },
        write
      )
    ).rejects.toThrow("boom");

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0]?.[0]).toMatch(/^metric cli\.show duration_ms=\d+ success=false\n$/);
  });
});
