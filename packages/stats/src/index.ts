import type { DurationSummary, LoadTestStatistics, TestResult } from './types';

const EMPTY_DURATIONS: DurationSummary = { min: 0, max: 0, mean: 0, median: 0, p95: 0, p99: 0 };

/**
 * Nearest-rank percentile over an ascending array: the value at
 * `floor(n * fraction)`, clamped to the last index. Not interpolated.
 */
export const percentile = (sorted: readonly number[], fraction: number): number => {
  if (sorted.length === 0) {
    return 0;
  }
  const index = Math.min(sorted.length - 1, Math.floor(sorted.length * fraction));
  return sorted[index];
};

export const median = (sorted: readonly number[]): number => {
  if (sorted.length === 0) {
    return 0;
  }
  const middle = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) {
    return sorted[middle];
  }
  return (sorted[middle - 1] + sorted[middle]) / 2;
};

export const summarizeDurations = (durations: readonly number[]): DurationSummary => {
  if (durations.length === 0) {
    return { ...EMPTY_DURATIONS };
  }
  const sorted = [...durations].sort((a, b) => a - b);
  const total = sorted.reduce((sum, value) => sum + value, 0);
  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: total / sorted.length,
    median: median(sorted),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
  };
};

// Keys come off the wire; a plain object would let `__proto__` or `constructor` collide with Object.prototype.
const countBy = <T>(items: readonly T[], key: (item: T) => string): Record<string, number> => {
  const counts = new Map<string, number>();
  for (const item of items) {
    const value = key(item);
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries(counts);
};

/**
 * Aggregate a finished run. Latency figures cover successful requests only;
 * results without a served-by value are left out of the server distribution.
 */
export const computeStatistics = (
  results: readonly TestResult[],
  totalDurationSec: number,
): LoadTestStatistics => {
  const successful = results.filter((result) => result.success);
  const failed = results.filter((result) => !result.success);
  const totalRequests = results.length;

  return {
    totalRequests,
    successful: successful.length,
    failed: failed.length,
    successRate: totalRequests === 0 ? 0 : (successful.length * 100) / totalRequests,
    totalDurationSec,
    requestsPerSec: totalDurationSec > 0 ? totalRequests / totalDurationSec : 0,
    durationMs: summarizeDurations(successful.map((result) => result.durationMs)),
    serverDistribution: countBy(
      results.filter((result) => result.servedBy !== ''),
      (result) => result.servedBy,
    ),
    repoDistribution: countBy(results, (result) => result.repo),
    errors: countBy(failed, (result) => result.error),
  };
};

export type {
  DurationSummary,
  LoadTestStatistics,
  Operation,
  TestResult,
} from './types';
