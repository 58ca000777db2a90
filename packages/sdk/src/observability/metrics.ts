/**
 * Metrics tracking for store operations
 */

export interface OperationMetrics {
  calls: number;
  errors: number;
  durationMs: number[];
}

const MAX_SAMPLES = 100;

export class MetricsCollector {
  #metrics = new Map<string, OperationMetrics>();

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(namespace: string, op: string): OperationMetrics {
    const key = `${namespace}/${op}`;
    let metrics = this.#metrics.get(key);
    if (!metrics) {
      metrics = { calls: 0, errors: 0, durationMs: [] };
      this.#metrics.set(key, metrics);
    }
    return metrics;
  }

  /**
   * Record one completed call
   */
  record(namespace: string, op: string, ms: number, ok: boolean): void {
    const metrics = this.#getMetrics(namespace, op);
    metrics.calls++;
    if (!ok) {
      metrics.errors++;
    }
    metrics.durationMs.push(ms);

    // Keep only the most recent samples
    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Get metrics for an operation
   */
  getMetrics(namespace: string, op: string): OperationMetrics | undefined {
    return this.#metrics.get(`${namespace}/${op}`);
  }

  /**
   * Get all metrics, keyed by "namespace/op"
   */
  getAllMetrics(): Map<string, OperationMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Fraction of calls that failed
   */
  getErrorRate(namespace: string, op: string): number {
    const metrics = this.#metrics.get(`${namespace}/${op}`);
    if (!metrics || metrics.calls === 0) return 0;
    return metrics.errors / metrics.calls;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Get p95 duration of an operation
   */
  getP95Duration(namespace: string, op: string): number {
    return this.getP95(this.#metrics.get(`${namespace}/${op}`)?.durationMs ?? []);
  }

  /**
   * Reset metrics for one namespace, or everything
   */
  reset(namespace?: string): void {
    if (namespace === undefined) {
      this.#metrics.clear();
      return;
    }
    for (const key of [...this.#metrics.keys()]) {
      if (key.startsWith(`${namespace}/`)) {
        this.#metrics.delete(key);
      }
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
