/**
 * Metrics tracking for index and query operations
 */

export interface OperationMetrics {
  count: number;
  errorCount: number;
  /** Last 100 durations in milliseconds */
  durationsMs: number[];
}

export type Operation = "upsert" | "commit" | "search" | "open";

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<Operation, OperationMetrics>();

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(op: Operation): OperationMetrics {
    let metrics = this.#metrics.get(op);
    if (!metrics) {
      metrics = { count: 0, errorCount: 0, durationsMs: [] };
      this.#metrics.set(op, metrics);
    }
    return metrics;
  }

  /**
   * Record a completed operation
   */
  record(op: Operation, ms: number, success = true): void {
    const metrics = this.#getMetrics(op);
    metrics.count++;
    if (!success) {
      metrics.errorCount++;
    }
    metrics.durationsMs.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (metrics.durationsMs.length > MAX_SAMPLES) {
      metrics.durationsMs.shift();
    }
  }

  /**
   * Time an operation, recording failure when it throws
   */
  measure<T>(op: Operation, fn: () => T): T {
    const start = performance.now();
    let success = false;
    try {
      const result = fn();
      success = true;
      return result;
    } finally {
      this.record(op, performance.now() - start, success);
    }
  }

  /**
   * Async variant of measure
   */
  async measureAsync<T>(op: Operation, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    let success = false;
    try {
      const result = await fn();
      success = true;
      return result;
    } finally {
      this.record(op, performance.now() - start, success);
    }
  }

  getMetrics(op: Operation): OperationMetrics | undefined {
    return this.#metrics.get(op);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95Duration(op: Operation): number {
    return this.getP95(this.#metrics.get(op)?.durationsMs ?? []);
  }

  /**
   * Reset metrics for one operation or all of them
   */
  reset(op?: Operation): void {
    if (op) {
      this.#metrics.delete(op);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
