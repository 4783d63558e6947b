/**
 * Core types for Game Data Finder
 */

/**
 * Any JSON value as found in a dataset entry
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * JSON object node
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One dataset entry with its resolved primary fields
 *
 * Invariants:
 * - `id` and `itemType` are derived from `value` once, at construction
 * - Records are frozen; a changed entry means a new record (and a new index)
 */
export interface GameRecord {
  /** Raw JSON tree of the entry */
  readonly value: JsonValue;
  /** `id` field, or `abstract` when `id` is missing or empty, or "" */
  readonly id: string;
  /** `type` field, or "" */
  readonly itemType: string;
  /** True when `id` was taken from the `abstract` field */
  readonly isAbstract: boolean;
}

/**
 * Parsed query term
 * @example "bash.str_min:'30'" → { classifier: "bash.str_min", pattern: "30", exact: true }
 */
export interface SearchTerm {
  /** Field selector before the first ":" (null when absent) */
  classifier: string | null;
  /** Text to match */
  pattern: string;
  /** True when the pattern was wrapped in single quotes */
  exact: boolean;
}

/**
 * Inverted index mapping: lower-cased key → record positions
 */
export type FieldIndex = Map<string, Set<number>>;

/**
 * Names of the four index mappings
 */
export type IndexKind = "byId" | "byType" | "byCategory" | "wordIndex";

/**
 * Index build progress callback (records processed so far, total records)
 */
export type ProgressCallback = (processed: number, total: number) => void;

/**
 * Key counts per mapping
 */
export type IndexStats = Record<IndexKind, number>;

/**
 * Metadata about the game build a dataset was exported from
 */
export interface BuildInfo {
  /** Build identifier (e.g., "2024-01-01" or "0.H") */
  buildNumber: string;
  /** Human-readable tag (defaults to buildNumber) */
  tagName: string;
  /** Whether this is a prerelease/nightly build */
  prerelease: boolean;
  /** ISO 8601 creation timestamp ("" when unknown) */
  createdAt: string;
}

/**
 * Parsed dataset root
 */
export interface Dataset {
  /** Build metadata (null when the root was a bare array) */
  build: BuildInfo | null;
  /** Raw entries in file order */
  values: JsonValue[];
}
