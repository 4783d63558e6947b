/**
 * Metrics tracking for index builds and searches
 */

import type { IndexStats } from "../types.js";

/** Samples kept per timing series */
const MAX_SAMPLES = 100;

export interface SearchMetrics {
  buildTimeMs: number[];
  queryTimeMs: number[];
  fastPathTerms: number;
  slowPathTerms: number;
  queries: number;
  indexSize: IndexStats | undefined;
}

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  // Keep only the latest samples to avoid unbounded memory growth
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics: SearchMetrics = MetricsCollector.#empty();

  static #empty(): SearchMetrics {
    return {
      buildTimeMs: [],
      queryTimeMs: [],
      fastPathTerms: 0,
      slowPathTerms: 0,
      queries: 0,
      indexSize: undefined,
    };
  }

  /**
   * Record an index build and the resulting key counts
   */
  recordBuild(ms: number, size: IndexStats): void {
    pushSample(this.#metrics.buildTimeMs, ms);
    this.#metrics.indexSize = { ...size };
  }

  /**
   * Record one evaluated query
   */
  recordQuery(ms: number): void {
    pushSample(this.#metrics.queryTimeMs, ms);
    this.#metrics.queries++;
  }

  /**
   * Record a term served by an index mapping
   */
  recordFastPath(): void {
    this.#metrics.fastPathTerms++;
  }

  /**
   * Record a term that required a record scan
   */
  recordSlowPath(): void {
    this.#metrics.slowPathTerms++;
  }

  /**
   * Snapshot of the current metrics
   */
  getMetrics(): SearchMetrics {
    const m = this.#metrics;
    return {
      ...m,
      buildTimeMs: [...m.buildTimeMs],
      queryTimeMs: [...m.queryTimeMs],
      indexSize: m.indexSize ? { ...m.indexSize } : undefined,
    };
  }

  /**
   * Share of terms served from an index mapping
   */
  getFastPathRate(): number {
    const total = this.#metrics.fastPathTerms + this.#metrics.slowPathTerms;
    return total > 0 ? this.#metrics.fastPathTerms / total : 0;
  }

  /**
   * Calculate p95 for a series
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  getP95QueryTime(): number {
    return this.getP95(this.#metrics.queryTimeMs);
  }

  reset(): void {
    this.#metrics = MetricsCollector.#empty();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
