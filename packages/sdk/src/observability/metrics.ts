/**
 * Metrics tracking for retrieval and completion calls
 */

/** Samples kept per latency series */
const MAX_SAMPLES = 100;

export interface RetrievalMetrics {
  /** Queries answered from keyword scores */
  scoredCount: number;
  /** Queries that fell back to store order */
  fallbackCount: number;
  retrieveTimeMs: number[];
  completionCount: number;
  completionErrorCount: number;
  completionTimeMs: number[];
}

function emptyMetrics(): RetrievalMetrics {
  return {
    scoredCount: 0,
    fallbackCount: 0,
    retrieveTimeMs: [],
    completionCount: 0,
    completionErrorCount: 0,
    completionTimeMs: [],
  };
}

function pushSample(series: number[], ms: number): void {
  series.push(ms);
  // Keep only the most recent samples to avoid unbounded memory growth
  if (series.length > MAX_SAMPLES) {
    series.shift();
  }
}

export class MetricsCollector {
  #metrics: RetrievalMetrics = emptyMetrics();

  /**
   * Record one retrieval and whether it used the store-order fallback
   */
  recordRetrieval(ms: number, fallback: boolean): void {
    if (fallback) {
      this.#metrics.fallbackCount++;
    } else {
      this.#metrics.scoredCount++;
    }
    pushSample(this.#metrics.retrieveTimeMs, ms);
  }

  /**
   * Record one completion request
   */
  recordCompletion(ms: number, success: boolean): void {
    this.#metrics.completionCount++;
    if (!success) {
      this.#metrics.completionErrorCount++;
    }
    pushSample(this.#metrics.completionTimeMs, ms);
  }

  /**
   * Copy of the current metrics
   */
  getMetrics(): RetrievalMetrics {
    return {
      ...this.#metrics,
      retrieveTimeMs: [...this.#metrics.retrieveTimeMs],
      completionTimeMs: [...this.#metrics.completionTimeMs],
    };
  }

  /**
   * Share of retrievals answered from keyword scores
   */
  getHitRate(): number {
    const total = this.#metrics.scoredCount + this.#metrics.fallbackCount;
    return total > 0 ? this.#metrics.scoredCount / total : 0;
  }

  /**
   * Calculate p95 for a series
   */
  getP95(values: readonly number[]): number {
    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  reset(): void {
    this.#metrics = emptyMetrics();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
