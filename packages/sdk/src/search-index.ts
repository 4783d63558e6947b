/**
 * Inverted index over a record collection
 *
 * Four mappings from lower-cased keys to record positions:
 * - byId: id (or abstract) of each record
 * - byType: type of each record
 * - byCategory: top-level "category" string of each record
 * - wordIndex: every word of every string anywhere in each record
 *
 * Invariants:
 * - Positions index into the exact array the index was built from
 * - Building twice from the same records yields identical mappings
 * - The index is never mutated after the build completes
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { getStringField } from "./record.js";
import { tokenize } from "./tokenize.js";
import { IndexBuildAbortedError } from "./errors.js";
import type {
  FieldIndex,
  GameRecord,
  IndexKind,
  IndexStats,
  JsonValue,
  ProgressCallback,
} from "./types.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Mappings that can be queried through a classifier
 */
export type FieldKind = Exclude<IndexKind, "wordIndex">;

/**
 * Read-only view of a mapping
 */
export type ReadonlyFieldIndex = ReadonlyMap<string, ReadonlySet<number>>;

/** Records between two progress callbacks */
export const PROGRESS_INTERVAL = 250;

/** Records between two yields to the event loop during async builds */
export const YIELD_INTERVAL = 1000;

/**
 * Options for the asynchronous build
 */
export interface BuildOptions {
  /** Called with (processed, total) at a bounded cadence and on the last record */
  onProgress?: ProgressCallback;
  /** Records between progress callbacks (default: 250) */
  progressInterval?: number;
  /** Records between yields to the event loop (default: 1000) */
  yieldInterval?: number;
  /** Cancels the build at the next yield point */
  signal?: AbortSignal;
}

function assertInterval(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function addPosition(index: FieldIndex, key: string, position: number): void {
  let positions = index.get(key);
  if (!positions) {
    positions = new Set();
    index.set(key, positions);
  }
  positions.add(position);
}

/**
 * Collect the words of every string inside a JSON tree
 * Numbers, booleans, null and object keys are not indexed
 */
function collectWords(value: JsonValue, words: Set<string>): void {
  if (typeof value === "string") {
    tokenize(value, words);
  } else if (Array.isArray(value)) {
    for (const item of value) {
      collectWords(item, words);
    }
  } else if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) {
      collectWords(item, words);
    }
  }
}

/**
 * Mutable accumulator used while a build is in progress
 */
class IndexBuilder {
  readonly byId: FieldIndex = new Map();
  readonly byType: FieldIndex = new Map();
  readonly byCategory: FieldIndex = new Map();
  readonly wordIndex: FieldIndex = new Map();

  add(position: number, record: GameRecord): void {
    const words = new Set<string>();

    if (record.id !== "") {
      addPosition(this.byId, record.id.toLowerCase(), position);
      tokenize(record.id, words);
    }

    if (record.itemType !== "") {
      addPosition(this.byType, record.itemType.toLowerCase(), position);
      tokenize(record.itemType, words);
    }

    const category = getStringField(record.value, "category");
    if (category !== undefined) {
      addPosition(this.byCategory, category.toLowerCase(), position);
      tokenize(category, words);
    }

    collectWords(record.value, words);

    // One insert per distinct word per record
    for (const word of words) {
      addPosition(this.wordIndex, word, position);
    }
  }

  finish(): SearchIndex {
    return new SearchIndex(this.byId, this.byType, this.byCategory, this.wordIndex);
  }
}

/**
 * Union the position sets of every key containing `needle`
 */
function unionContaining(index: ReadonlyFieldIndex, needle: string): Set<number> {
  const result = new Set<number>();
  for (const [key, positions] of index) {
    if (key.includes(needle)) {
      for (const position of positions) {
        result.add(position);
      }
    }
  }
  return result;
}

/**
 * Inverted index for fast search across large record collections
 */
export class SearchIndex {
  readonly byId: ReadonlyFieldIndex;
  readonly byType: ReadonlyFieldIndex;
  readonly byCategory: ReadonlyFieldIndex;
  readonly wordIndex: ReadonlyFieldIndex;

  constructor(
    byId: ReadonlyFieldIndex = new Map(),
    byType: ReadonlyFieldIndex = new Map(),
    byCategory: ReadonlyFieldIndex = new Map(),
    wordIndex: ReadonlyFieldIndex = new Map()
  ) {
    this.byId = byId;
    this.byType = byType;
    this.byCategory = byCategory;
    this.wordIndex = wordIndex;
  }

  /**
   * Build an index in one synchronous pass
   * @param records - Records to index; positions refer to this array
   * @param onProgress - Called on the first record, every 250 records and the last record
   */
  static build(records: readonly GameRecord[], onProgress?: ProgressCallback): SearchIndex {
    const startTime = performance.now();
    const total = records.length;
    logger.debug("index.build.start", { details: { records: total } });

    const builder = new IndexBuilder();
    records.forEach((record, position) => {
      builder.add(position, record);
      if (onProgress && (position % PROGRESS_INTERVAL === 0 || position + 1 === total)) {
        onProgress(position + 1, total);
      }
    });

    const index = builder.finish();
    recordBuild(index, performance.now() - startTime);
    return index;
  }

  /**
   * Look up a classifier mapping
   *
   * Exact lookups compare the lower-cased pattern with whole keys. Inexact
   * lookups scan every key and keep those containing the lower-cased pattern,
   * so their cost grows with the number of distinct keys.
   */
  lookupField(kind: FieldKind, pattern: string, exact: boolean): Set<number> {
    const index = this[kind];
    const needle = pattern.toLowerCase();

    if (exact) {
      return new Set(index.get(needle));
    }
    return unionContaining(index, needle);
  }

  /**
   * Positions of records containing a word that contains `pattern`
   */
  searchWords(pattern: string): Set<number> {
    return unionContaining(this.wordIndex, pattern.toLowerCase());
  }

  /**
   * Number of distinct keys per mapping
   */
  stats(): IndexStats {
    return {
      byId: this.byId.size,
      byType: this.byType.size,
      byCategory: this.byCategory.size,
      wordIndex: this.wordIndex.size,
    };
  }
}

function recordBuild(index: SearchIndex, durationMs: number): void {
  const stats = index.stats();
  metrics.recordBuild(durationMs, stats);
  logger.debug("index.build.done", {
    details: { ...stats, durationMs: Math.round(durationMs) },
  });
}

/**
 * Build an index without starving the event loop
 *
 * Yields every `yieldInterval` records so pending I/O and timers can run.
 * The result is identical to SearchIndex.build for the same records.
 * @throws RangeError if an interval is not a positive integer
 * @throws IndexBuildAbortedError if `signal` aborts before the build completes
 */
export async function buildSearchIndexAsync(
  records: readonly GameRecord[],
  options: BuildOptions = {}
): Promise<SearchIndex> {
  const {
    onProgress,
    progressInterval = PROGRESS_INTERVAL,
    yieldInterval = YIELD_INTERVAL,
    signal,
  } = options;
  assertInterval("progressInterval", progressInterval);
  assertInterval("yieldInterval", yieldInterval);

  const startTime = performance.now();
  const total = records.length;
  logger.debug("index.build.start", { details: { records: total, async: true } });

  const throwIfAborted = (processed: number): void => {
    if (signal?.aborted) {
      logger.debug("index.build.aborted", { details: { processed, total } });
      throw new IndexBuildAbortedError(processed, total, { cause: signal.reason });
    }
  };

  throwIfAborted(0);

  const builder = new IndexBuilder();
  for (let position = 0; position < total; position++) {
    const record = records[position];
    if (record === undefined) continue;

    builder.add(position, record);

    const isLast = position + 1 === total;
    if (onProgress && (position % progressInterval === 0 || isLast)) {
      onProgress(position + 1, total);
    }
    if (position % yieldInterval === 0 || isLast) {
      await yieldToEventLoop();
      throwIfAborted(position + 1);
    }
  }

  const index = builder.finish();
  recordBuild(index, performance.now() - startTime);
  return index;
}
