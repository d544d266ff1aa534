const MAX_SAMPLES = 1000;

/**
 * In-process counters and duration samples, exposed on GET /api/metrics.
 * Nothing is persisted; a restart starts from zero.
 */
class MetricsService {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  increment(name: string, value = 1): void {
    this.counters.set(name, (this.counters.get(name) || 0) + value);
  }

  recordDuration(name: string, ms: number): void {
    const values = this.histograms.get(name) || [];
    values.push(ms);
    if (values.length > MAX_SAMPLES) values.shift();
    this.histograms.set(name, values);
  }

  getMetrics(): Record<string, number> {
    const result: Record<string, number> = {};

    this.counters.forEach((v, k) => {
      result[k] = v;
    });

    this.histograms.forEach((values, name) => {
      if (values.length === 0) return;
      const sorted = [...values].sort((a, b) => a - b);
      result[`${name}_count`] = sorted.length;
      result[`${name}_p50`] = sorted[Math.floor(sorted.length * 0.5)] || 0;
      result[`${name}_p95`] = sorted[Math.floor(sorted.length * 0.95)] || 0;
      result[`${name}_max`] = sorted[sorted.length - 1] || 0;
    });

    return result;
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

export const metrics = new MetricsService();
