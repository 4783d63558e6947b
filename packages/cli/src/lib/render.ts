/**
 * Output rendering helpers
 */

import { displayNameFor, type GameRecord } from "@gdfind/sdk";

type Color = "red" | "green" | "yellow";

/**
 * One search hit as printed by `search --json`
 */
export interface RecordSummary {
  index: number;
  id: string;
  type: string;
  name: string;
}

/**
 * Print JSON
 * @param write - Output channel
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(
  write: (text: string) => void,
  data: unknown,
  options?: { raw?: boolean }
): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  write(json + "\n");
}

/**
 * Print lines (one per line)
 */
export function printLines(write: (text: string) => void, lines: readonly string[]): void {
  for (const line of lines) {
    write(line + "\n");
  }
}

/**
 * Apply ANSI color only when writing to a terminal
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * "<type> <display name>", or just the name for untyped records
 */
export function formatRecordLine(record: GameRecord): string {
  const name = displayNameFor(record);
  return record.itemType === "" ? name : `${record.itemType} ${name}`;
}

export function summarizeRecord(index: number, record: GameRecord): RecordSummary {
  return {
    index,
    id: record.id,
    type: record.itemType,
    name: displayNameFor(record),
  };
}

/**
 * Progress line that redraws in place
 */
export function formatProgress(label: string, ratio: number): string {
  const percent = Math.round(Math.min(Math.max(ratio, 0), 1) * 100);
  return `\r${label} ${String(percent).padStart(3)}%`;
}

/**
 * Format a duration in milliseconds
 */
export function formatMs(ms: number): string {
  return ms >= 1000 ? `${(ms / 1000).toFixed(2)} s` : `${ms.toFixed(2)} ms`;
}
