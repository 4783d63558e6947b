/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_DATASET_FILE } from "@gdfind/sdk";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the dataset file
 * Priority: CLI option > GDFIND_DATA_FILE env var > default "all.json"
 */
export function resolveDataFile(cliFile?: string): string {
  const file = cliFile ?? process.env.GDFIND_DATA_FILE ?? DEFAULT_DATASET_FILE;
  return path.resolve(expandTilde(file));
}

/**
 * Check if timing metrics should be printed
 */
export function isVerbose(): boolean {
  return process.env.GDFIND_CLI_DEBUG === "1";
}
