export interface LatencySummary {
  count: number;
  mean: number;
  p50: number;
  p95: number;
  min: number;
  max: number;
}

/**
 * Accumulates task durations and reports nearest-rank statistics.
 *
 * Not safe for concurrent mutation: the runner owns one instance and
 * records from a single sequential loop.
 */
export class LatencyAggregator {
  private readonly samples: number[] = [];

  record(durationMs: number): void {
    this.samples.push(Number.isFinite(durationMs) ? Math.max(0, durationMs) : 0);
  }

  get count(): number {
    return this.samples.length;
  }

  // p in [0, 1]; index = ceil(p * n) - 1, clamped to the sample range.
  percentile(p: number): number {
    if (this.samples.length === 0) return 0;
    const sorted = this.sorted();
    const rank = Math.ceil(clampUnit(p) * sorted.length) - 1;
    const index = Math.min(Math.max(rank, 0), sorted.length - 1);
    return sorted[index];
  }

  summary(): LatencySummary {
    const count = this.samples.length;
    if (count === 0) {
      return { count: 0, mean: 0, p50: 0, p95: 0, min: 0, max: 0 };
    }
    const sorted = this.sorted();
    const total = sorted.reduce((acc, value) => acc + value, 0);
    return {
      count,
      mean: total / count,
      p50: this.percentile(0.5),
      p95: this.percentile(0.95),
      min: sorted[0],
      max: sorted[count - 1],
    };
  }

  private sorted(): number[] {
    return [...this.samples].sort((a, b) => a - b);
  }
}

function clampUnit(p: number): number {
  if (!Number.isFinite(p)) return 0;
  return Math.min(Math.max(p, 0), 1);
}
