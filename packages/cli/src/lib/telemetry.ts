/**
 * Command timing lines for GDFIND_CLI_DEBUG=1
 *
 * Each command reports one line on stderr:
 *   metric cli.search duration_ms=12 success=true records=5 matches=2 fast_path_rate=1 query_p95_ms=0.4
 */

import { metrics } from "@gdfind/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

/**
 * Counts a command fills in while it runs (records loaded, matches found)
 */
export type CommandFields = Record<string, number | string>;

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Emit a metric line if verbose mode is enabled
 */
export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  write: (text: string) => void = writeStderr
): void {
  if (!isVerbose()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  write(parts.join(" ") + "\n");
}

/**
 * Run a command and report its duration, its own counts and the search
 * metrics gathered while it ran
 *
 * Search metrics are process-wide; a CLI process runs one command, so they
 * describe that command.
 */
export async function withTiming<T>(
  label: string,
  fn: (fields: CommandFields) => Promise<T>,
  write: (text: string) => void = writeStderr
): Promise<T> {
  const fields: CommandFields = {};
  const start = performance.now();
  let success = false;

  try {
    const result = await fn(fields);
    success = true;
    return result;
  } finally {
    const snapshot = metrics.getMetrics();
    const searchFields =
      snapshot.queries > 0
        ? {
            fast_path_rate: round2(metrics.getFastPathRate()),
            query_p95_ms: round2(metrics.getP95QueryTime()),
          }
        : {};

    emitMetric(
      label,
      {
        duration_ms: Math.round(performance.now() - start),
        success,
        ...fields,
        ...searchFields,
      },
      write
    );
  }
}
