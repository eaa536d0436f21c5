import { GitUploadPackClient } from '@packload/protocol-client';
import { computeStatistics } from '@packload/stats';
import type { LoadTestStatistics, TestResult } from '@packload/stats';
import type { LoadTestConfig } from './config';
import type { LoadTestMetrics } from './observability';
import { createRng } from './random';
import type { Rng } from './random';
import { runWorker } from './worker';
import type { UploadPackClient, WorkerProgress } from './worker';

export type LoadTestRunOptions = Pick<
  LoadTestConfig,
  | 'url'
  | 'repos'
  | 'workers'
  | 'requestsPerWorker'
  | 'thinkTimeMs'
  | 'timeoutMs'
  | 'lsRefsRatio'
  | 'wantRefSource'
  | 'seed'
> & {
  createClient?: (workerId: number) => UploadPackClient;
  delay?: (ms: number) => Promise<void>;
  metrics?: LoadTestMetrics;
  onProgress?: (progress: WorkerProgress) => void;
};

export type LoadTestRun = {
  results: TestResult[];
  statistics: LoadTestStatistics;
};

const workerRng = (seed: number | undefined, workerId: number): Rng => {
  return seed === undefined ? Math.random : createRng(seed + workerId + 1);
};

/**
 * Start every worker at once and wait for all of them. Each worker's results
 * are appended whole when it finishes, in completion order; statistics are
 * computed once after the last worker is done. A worker that throws does not
 * cut the others short: the first error is rethrown once every worker settled.
 */
export const runLoadTest = async (options: LoadTestRunOptions): Promise<LoadTestRun> => {
  const createClient =
    options.createClient ??
    (() => new GitUploadPackClient({ baseUrl: options.url, timeoutMs: options.timeoutMs }));
  const collected: TestResult[] = [];
  const start = process.hrtime.bigint();

  const workers = Array.from({ length: options.workers }, (_, workerId) =>
    runWorker({
      workerId,
      repos: options.repos,
      requestsPerWorker: options.requestsPerWorker,
      thinkTimeMs: options.thinkTimeMs,
      lsRefsRatio: options.lsRefsRatio,
      wantRefSource: options.wantRefSource,
      client: createClient(workerId),
      rng: workerRng(options.seed, workerId),
      delay: options.delay,
      metrics: options.metrics,
      onProgress: options.onProgress,
    }).then((results) => {
      for (const result of results) {
        collected.push(result);
      }
    }),
  );
  const settled = await Promise.allSettled(workers);
  const rejected = settled.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
  if (rejected) {
    throw rejected.reason;
  }

  const totalDurationSec = Number(process.hrtime.bigint() - start) / 1_000_000_000;
  return { results: collected, statistics: computeStatistics(collected, totalDurationSec) };
};

export const exitCodeFor = (statistics: LoadTestStatistics, minSuccessRate = 95): number => {
  return statistics.successRate >= minSuccessRate ? 0 : 1;
};
