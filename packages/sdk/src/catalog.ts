/**
 * Catalog: a record collection bundled with the index built from it
 *
 * Invariants:
 * - Records and index are created together and never replaced separately
 * - Positions returned by search() index into this catalog's records
 * - Records are ordered by (type, id) unless sorting is disabled
 */

import { compareRecords, createRecord } from "./record.js";
import { SearchIndex, buildSearchIndexAsync } from "./search-index.js";
import { findMatches } from "./query.js";
import type {
  BuildInfo,
  GameRecord,
  IndexStats,
  JsonValue,
  ProgressCallback,
} from "./types.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Share of overall load progress spent turning raw values into records;
 * the rest is spent building the index
 */
export const ITEMS_PROGRESS_WEIGHT = 0.4;

/** Values between two progress reports while building records */
const ITEMS_PROGRESS_INTERVAL = 500;

/**
 * Options shared by the synchronous and asynchronous constructors
 */
export interface CatalogOptions {
  /** Build metadata to carry along (default: null) */
  build?: BuildInfo | null;
  /** Order records by (type, id) before indexing (default: true) */
  sort?: boolean;
  /** Called with overall progress in [0, 1] */
  onProgress?: (ratio: number) => void;
}

/**
 * Options for Catalog.load
 */
export interface CatalogLoadOptions extends CatalogOptions {
  /** Records between yields to the event loop while indexing */
  yieldInterval?: number;
  /** Cancels the index build at its next yield point */
  signal?: AbortSignal;
}

/**
 * Summary of a catalog
 */
export interface CatalogStats {
  records: number;
  build: BuildInfo | null;
  indexTimeMs: number;
  index: IndexStats;
}

function buildRecords(
  values: readonly JsonValue[],
  sort: boolean,
  onProgress?: (ratio: number) => void
): GameRecord[] {
  const total = values.length;
  const records = values.map((value, idx) => {
    if (onProgress && (idx % ITEMS_PROGRESS_INTERVAL === 0 || idx + 1 === total)) {
      onProgress(((idx + 1) / total) * ITEMS_PROGRESS_WEIGHT);
    }
    return createRecord(value);
  });

  if (sort) {
    records.sort(compareRecords);
  }
  onProgress?.(ITEMS_PROGRESS_WEIGHT);
  return records;
}

/**
 * Map index progress onto the part of [0, 1] left after record construction
 */
function indexProgress(onProgress?: (ratio: number) => void): ProgressCallback | undefined {
  if (!onProgress) return undefined;
  return (processed: number, total: number): void => {
    const ratio = total > 0 ? processed / total : 1;
    onProgress(ITEMS_PROGRESS_WEIGHT + (1 - ITEMS_PROGRESS_WEIGHT) * ratio);
  };
}

export class Catalog {
  readonly records: readonly GameRecord[];
  readonly build: BuildInfo | null;
  readonly indexTimeMs: number;
  readonly #index: SearchIndex;
  readonly #ids: ReadonlySet<string>;

  private constructor(
    records: GameRecord[],
    index: SearchIndex,
    build: BuildInfo | null,
    indexTimeMs: number
  ) {
    this.records = Object.freeze(records);
    this.#index = index;
    this.build = build;
    this.indexTimeMs = indexTimeMs;
    this.#ids = new Set(records.filter((r) => r.id !== "").map((r) => r.id));
  }

  /**
   * Build a catalog in one synchronous pass
   */
  static fromValues(values: readonly JsonValue[], options: CatalogOptions = {}): Catalog {
    const startTime = performance.now();
    const records = buildRecords(values, options.sort ?? true, options.onProgress);
    const index = SearchIndex.build(records, indexProgress(options.onProgress));
    return Catalog.#finish(records, index, options.build ?? null, startTime);
  }

  /**
   * Build a catalog, yielding to the event loop while indexing
   * @throws IndexBuildAbortedError if `signal` aborts the build
   */
  static async load(
    values: readonly JsonValue[],
    options: CatalogLoadOptions = {}
  ): Promise<Catalog> {
    const startTime = performance.now();
    const records = buildRecords(values, options.sort ?? true, options.onProgress);
    const index = await buildSearchIndexAsync(records, {
      onProgress: indexProgress(options.onProgress),
      yieldInterval: options.yieldInterval,
      signal: options.signal,
    });
    return Catalog.#finish(records, index, options.build ?? null, startTime);
  }

  static #finish(
    records: GameRecord[],
    index: SearchIndex,
    build: BuildInfo | null,
    startTime: number
  ): Catalog {
    const indexTimeMs = Math.max(0, performance.now() - startTime);
    logger.debug("catalog.ready", {
      message: `Indexed ${records.length} records`,
      details: { ...index.stats(), indexTimeMs: Math.round(indexTimeMs) },
    });
    return new Catalog(records, index, build, indexTimeMs);
  }

  /**
   * Number of records
   */
  get size(): number {
    return this.records.length;
  }

  /**
   * The index built from this catalog's records
   */
  get index(): SearchIndex {
    return this.#index;
  }

  /**
   * Evaluate a query
   * @returns Ascending record positions
   */
  search(query: string): number[] {
    const startTime = performance.now();
    const matches = findMatches(query, this.records, this.#index);
    const durationMs = performance.now() - startTime;

    metrics.recordQuery(durationMs);
    logger.debug("catalog.search", {
      details: { query, matches: matches.length, durationMs: Math.round(durationMs) },
    });
    return matches;
  }

  /**
   * Record at a position
   */
  get(position: number): GameRecord | undefined {
    return this.records[position];
  }

  /**
   * Records at the given positions, skipping positions out of range
   */
  resolve(positions: readonly number[]): GameRecord[] {
    const result: GameRecord[] = [];
    for (const position of positions) {
      const record = this.records[position];
      if (record) {
        result.push(record);
      }
    }
    return result;
  }

  /**
   * Whether some record has exactly this id (case-sensitive)
   */
  hasId(id: string): boolean {
    return this.#ids.has(id);
  }

  /**
   * First record whose id equals `id` exactly
   */
  findById(id: string): GameRecord | undefined {
    if (!this.hasId(id)) {
      return undefined;
    }
    const positions = [...this.#index.lookupField("byId", id, true)].sort((a, b) => a - b);
    return this.resolve(positions).find((record) => record.id === id);
  }

  stats(): CatalogStats {
    return {
      records: this.records.length,
      build: this.build,
      indexTimeMs: this.indexTimeMs,
      index: this.#index.stats(),
    };
  }
}
