/**
 * Game Data Finder SDK
 *
 * Inverted index and query engine for browsing game-entity datasets
 */

// Re-export types
export type {
  JsonValue,
  JsonObject,
  GameRecord,
  SearchTerm,
  FieldIndex,
  IndexKind,
  IndexStats,
  ProgressCallback,
  BuildInfo,
  Dataset,
} from "./types.js";

// Record model
export { createRecord, compareRecords, getStringField, isJsonObject } from "./record.js";
export { displayNameFor } from "./display.js";
export { tokenize, MIN_WORD_LENGTH } from "./tokenize.js";

// Index and query engine
export type { BuildOptions, FieldKind, ReadonlyFieldIndex } from "./search-index.js";
export {
  SearchIndex,
  buildSearchIndexAsync,
  PROGRESS_INTERVAL,
  YIELD_INTERVAL,
} from "./search-index.js";
export {
  splitQueryTerms,
  parseSearchTerm,
  parseQuery,
  matchesValue,
  matchesField,
  resolveTerm,
  findMatches,
} from "./query.js";

// Catalog and sessions
export type { CatalogOptions, CatalogLoadOptions, CatalogStats } from "./catalog.js";
export { Catalog, ITEMS_PROGRESS_WEIGHT } from "./catalog.js";
export type { SearchResult, SearchResultListener, SearchSessionOptions } from "./session.js";
export { SearchSession, DEFAULT_DEBOUNCE_MS } from "./session.js";

// Dataset loading
export {
  loadDatasetFile,
  parseDataset,
  parseDatasetText,
  DEFAULT_DATASET_FILE,
} from "./loader.js";

// Re-export errors
export {
  GameDataError,
  DatasetNotFoundError,
  DatasetReadError,
  DatasetFormatError,
  IndexBuildAbortedError,
} from "./errors.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { SearchMetrics } from "./observability/metrics.js";
