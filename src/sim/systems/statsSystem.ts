export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface DistributionStats {
  mean: number;
  std: number;
  min: number;
  max: number;
  p5: number;
  p50: number;
  p95: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return Number.NaN;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation; 0 for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squares = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/** Linear interpolation between closest ranks of an ascending array. */
export function percentileSorted(sorted: readonly number[], pct: number): number {
  if (sorted.length === 0) return Number.NaN;
  const rank = (pct / 100) * (sorted.length - 1);
  const lo = Math.floor(rank);
  const hi = Math.min(sorted.length - 1, lo + 1);
  const lower = sorted[lo] ?? Number.NaN;
  const upper = sorted[hi] ?? lower;
  return lower + (upper - lower) * (rank - lo);
}

export function percentile(values: readonly number[], pct: number): number {
  return percentileSorted([...values].sort((a, b) => a - b), pct);
}

export function median(values: readonly number[]): number {
  return percentile(values, 50);
}

export function histogram(values: readonly number[], bins: number): HistogramBin[] {
  if (values.length === 0 || bins <= 0) return [];
  let lo = values.reduce((acc, v) => Math.min(acc, v), Infinity);
  let hi = values.reduce((acc, v) => Math.max(acc, v), -Infinity);
  if (lo === hi) {
    lo -= 0.5;
    hi += 0.5;
  }
  const width = (hi - lo) / bins;
  const out: HistogramBin[] = Array.from({ length: bins }, (_, i) => ({
    start: lo + i * width,
    end: i === bins - 1 ? hi : lo + (i + 1) * width,
    count: 0
  }));
  for (const value of values) {
    const index = Math.min(bins - 1, Math.floor((value - lo) / width));
    const bin = out[index];
    if (bin) bin.count += 1;
  }
  return out;
}

export function describeDistribution(values: readonly number[]): DistributionStats | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  return {
    mean: mean(sorted),
    std: sampleStd(sorted),
    min: sorted[0] ?? Number.NaN,
    max: sorted[sorted.length - 1] ?? Number.NaN,
    p5: percentileSorted(sorted, 5),
    p50: percentileSorted(sorted, 50),
    p95: percentileSorted(sorted, 95)
  };
}
