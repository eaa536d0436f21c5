export type Operation = 'ls-refs' | 'fetch';

/** Outcome of one issued request. */
export type TestResult = Readonly<{
  success: boolean;
  durationMs: number;
  repo: string;
  operation: Operation;
  /** Backend or cache node that answered; empty when the proxy did not say. */
  servedBy: string;
  /** Short cause of a failure; empty on success. */
  error: string;
}>;

export type DurationSummary = {
  min: number;
  max: number;
  mean: number;
  median: number;
  p95: number;
  p99: number;
};

export type LoadTestStatistics = {
  totalRequests: number;
  successful: number;
  failed: number;
  successRate: number;
  totalDurationSec: number;
  requestsPerSec: number;
  durationMs: DurationSummary;
  serverDistribution: Record<string, number>;
  repoDistribution: Record<string, number>;
  errors: Record<string, number>;
};
