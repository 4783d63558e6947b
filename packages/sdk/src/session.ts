/**
 * Debounced search over a catalog for interactive callers
 *
 * Every submitted query captures a generation number. Submitting again,
 * cancelling or swapping the catalog bumps the generation; work tagged with
 * an older generation resolves to null and never reaches listeners.
 */

import type { Catalog } from "./catalog.js";
import { logger } from "./observability/logs.js";

/** Default delay before a submitted query is evaluated */
export const DEFAULT_DEBOUNCE_MS = 150;

/**
 * Result of one evaluated query
 */
export interface SearchResult {
  /** Generation the query was submitted under */
  generation: number;
  query: string;
  /** Ascending record positions in the session's catalog */
  matches: number[];
}

export type SearchResultListener = (result: SearchResult) => void;

export interface SearchSessionOptions {
  /** Delay before evaluating a submitted query (default: 150) */
  debounceMs?: number;
}

interface PendingSearch {
  timer: ReturnType<typeof setTimeout>;
  resolve: (result: SearchResult | null) => void;
}

export class SearchSession {
  #catalog: Catalog;
  #generation = 0;
  #pending: PendingSearch | undefined;
  #listeners = new Set<SearchResultListener>();
  readonly #debounceMs: number;

  constructor(catalog: Catalog, options: SearchSessionOptions = {}) {
    this.#catalog = catalog;
    this.#debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  }

  get catalog(): Catalog {
    return this.#catalog;
  }

  /**
   * Generation of the most recent submission
   */
  get generation(): number {
    return this.#generation;
  }

  /**
   * Evaluate `query` after the debounce delay
   * @returns The result, or null if a newer query, cancel() or a catalog swap came first
   */
  submit(query: string): Promise<SearchResult | null> {
    const generation = this.#supersede();

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.#pending = undefined;
        resolve(this.#run(generation, query));
      }, this.#debounceMs);
      this.#pending = { timer, resolve };
    });
  }

  /**
   * Evaluate `query` immediately, discarding any pending submission
   */
  searchNow(query: string): SearchResult {
    const generation = this.#supersede();
    const matches = this.#catalog.search(query);
    const result = { generation, query, matches };
    this.#notify(result);
    return result;
  }

  /**
   * Swap in a new catalog; pending searches against the old one are discarded
   */
  replaceCatalog(catalog: Catalog): void {
    this.#supersede();
    this.#catalog = catalog;
  }

  /**
   * Subscribe to results that were not superseded
   * @returns Unsubscribe function
   */
  onResult(listener: SearchResultListener): () => void {
    this.#listeners.add(listener);
    return () => {
      this.#listeners.delete(listener);
    };
  }

  /**
   * Discard any pending submission
   */
  cancel(): void {
    this.#supersede();
  }

  dispose(): void {
    this.cancel();
    this.#listeners.clear();
  }

  /**
   * Bump the generation and settle the pending submission as stale
   */
  #supersede(): number {
    this.#generation++;

    const pending = this.#pending;
    if (pending) {
      this.#pending = undefined;
      clearTimeout(pending.timer);
      logger.debug("session.stale", { details: { generation: this.#generation } });
      pending.resolve(null);
    }

    return this.#generation;
  }

  #run(generation: number, query: string): SearchResult | null {
    if (generation !== this.#generation) {
      logger.debug("session.stale", { details: { generation, current: this.#generation } });
      return null;
    }

    const result = { generation, query, matches: this.#catalog.search(query) };
    this.#notify(result);
    return result;
  }

  #notify(result: SearchResult): void {
    for (const listener of this.#listeners) {
      try {
        listener(result);
      } catch (err) {
        logger.error("session.listener.error", {
          message: err instanceof Error ? err.message : String(err),
          details: { generation: result.generation },
        });
      }
    }
  }
}
