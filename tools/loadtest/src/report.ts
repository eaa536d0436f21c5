import { writeFile } from 'node:fs/promises';
import type { LoadTestStatistics } from '@packload/stats';
import type { LoadTestMetrics } from './observability';

const RULE = '='.repeat(60);

export type ReportJson = {
  total_requests: number;
  successful: number;
  failed: number;
  success_rate: number;
  total_duration_sec: number;
  requests_per_sec: number;
  duration_ms: LoadTestStatistics['durationMs'];
  server_distribution: Record<string, number>;
  repo_distribution: Record<string, number>;
  errors: Record<string, number>;
};

const fixed = (value: number): string => value.toFixed(2);

const share = (count: number, total: number): string => {
  return total === 0 ? '0.00' : fixed((count / total) * 100);
};

const distributionLines = (counts: Record<string, number>, total: number): string[] => {
  return Object.entries(counts)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, count]) => `  ${name.padEnd(20)} ${String(count).padStart(6)} (${share(count, total).padStart(5)}%)`);
};

export const formatSummary = (stats: LoadTestStatistics): string => {
  const lines = [
    '',
    RULE,
    'LOAD TEST RESULTS',
    RULE,
    '',
    `Total Requests:    ${stats.totalRequests}`,
    `Successful:        ${stats.successful}`,
    `Failed:            ${stats.failed}`,
    `Success Rate:      ${fixed(stats.successRate)}%`,
    `Total Duration:    ${fixed(stats.totalDurationSec)}s`,
    `Requests/sec:      ${fixed(stats.requestsPerSec)}`,
    '',
    'Response Times (ms):',
    `  Min:             ${fixed(stats.durationMs.min)}`,
    `  Max:             ${fixed(stats.durationMs.max)}`,
    `  Mean:            ${fixed(stats.durationMs.mean)}`,
    `  Median:          ${fixed(stats.durationMs.median)}`,
    `  P95:             ${fixed(stats.durationMs.p95)}`,
    `  P99:             ${fixed(stats.durationMs.p99)}`,
  ];

  if (Object.keys(stats.serverDistribution).length > 0) {
    lines.push('', 'Server Distribution:', ...distributionLines(stats.serverDistribution, stats.totalRequests));
  }
  if (Object.keys(stats.repoDistribution).length > 0) {
    lines.push('', 'Repository Distribution:', ...distributionLines(stats.repoDistribution, stats.totalRequests));
  }
  if (Object.keys(stats.errors).length > 0) {
    lines.push('', 'Errors:');
    for (const [error, count] of Object.entries(stats.errors).sort(([, a], [, b]) => b - a)) {
      lines.push(`  ${error.padEnd(40)} ${String(count).padStart(6)}`);
    }
  }

  lines.push('', RULE, '');
  return lines.join('\n');
};

export const toReportJson = (stats: LoadTestStatistics): ReportJson => ({
  total_requests: stats.totalRequests,
  successful: stats.successful,
  failed: stats.failed,
  success_rate: stats.successRate,
  total_duration_sec: stats.totalDurationSec,
  requests_per_sec: stats.requestsPerSec,
  duration_ms: { ...stats.durationMs },
  server_distribution: stats.serverDistribution,
  repo_distribution: stats.repoDistribution,
  errors: stats.errors,
});

export const writeJsonReport = async (path: string, stats: LoadTestStatistics): Promise<void> => {
  await writeFile(path, `${JSON.stringify(toReportJson(stats), null, 2)}\n`, 'utf8');
};

export const writeMetricsReport = async (path: string, metrics: LoadTestMetrics): Promise<void> => {
  await writeFile(path, await metrics.registry.metrics(), 'utf8');
};
