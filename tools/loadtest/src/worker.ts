import { setTimeout as sleep } from 'node:timers/promises';
import { SpanStatusCode } from '@opentelemetry/api';
import { PLACEHOLDER_WANT_REF } from '@packload/pkt-line';
import type { AdvertisedRef } from '@packload/pkt-line';
import type { GitUploadPackClient, ProtocolResult } from '@packload/protocol-client';
import type { Operation, TestResult } from '@packload/stats';
import type { WantRefSource } from './config';
import { loadTestTracer, recordResult } from './observability';
import type { LoadTestMetrics } from './observability';
import { pick } from './random';
import type { Rng } from './random';

export type UploadPackClient = Pick<GitUploadPackClient, 'lsRefs' | 'fetch' | 'close'>;

export type WorkerProgress = {
  workerId: number;
  completed: number;
  total: number;
};

export type WorkerOptions = {
  workerId: number;
  repos: readonly string[];
  requestsPerWorker: number;
  thinkTimeMs: number;
  lsRefsRatio: number;
  wantRefSource: WantRefSource;
  /** Owned by the worker and closed once its quota is done. */
  client: UploadPackClient;
  rng: Rng;
  delay?: (ms: number) => Promise<void>;
  metrics?: LoadTestMetrics;
  onProgress?: (progress: WorkerProgress) => void;
};

export const PROGRESS_INTERVAL = 10;

const defaultDelay = async (ms: number): Promise<void> => {
  await sleep(ms);
};

const preferredRef = (refs: AdvertisedRef[]): string | undefined => {
  const branch = refs.find((ref) => ref.name.startsWith('refs/heads/'));
  return (branch ?? refs[0])?.oid;
};

export const chooseOperation = (rng: Rng, lsRefsRatio: number): Operation => {
  return rng() < lsRefsRatio ? 'ls-refs' : 'fetch';
};

/**
 * Run one simulated client: a fixed number of sequential requests, each
 * against a random repository, with a think-time pause between them.
 */
export const runWorker = async (options: WorkerOptions): Promise<TestResult[]> => {
  const delay = options.delay ?? defaultDelay;
  const discoveredRefs = new Map<string, string>();
  const results: TestResult[] = [];

  const issue = async (repo: string, operation: Operation): Promise<ProtocolResult> => {
    if (operation === 'ls-refs') {
      const response = await options.client.lsRefs(repo);
      const oid = preferredRef(response.refs);
      if (oid) {
        discoveredRefs.set(repo, oid);
      }
      return response;
    }
    const wantRef =
      options.wantRefSource === 'discovered'
        ? discoveredRefs.get(repo) ?? PLACEHOLDER_WANT_REF
        : PLACEHOLDER_WANT_REF;
    return options.client.fetch(repo, wantRef);
  };

  try {
    for (let i = 0; i < options.requestsPerWorker; i += 1) {
      const repo = pick(options.rng, options.repos);
      const operation = chooseOperation(options.rng, options.lsRefsRatio);

      const span = loadTestTracer.startSpan('loadtest.request', {
        attributes: { 'loadtest.worker': options.workerId, 'git.repo': repo, 'git.operation': operation },
      });
      const response = await issue(repo, operation);
      span.setAttribute('loadtest.success', response.success);
      if (!response.success) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: response.error });
      }
      span.end();

      const result: TestResult = {
        success: response.success,
        durationMs: response.durationMs,
        repo,
        operation,
        servedBy: response.servedBy,
        error: response.error,
      };
      results.push(result);
      if (options.metrics) {
        recordResult(options.metrics, result);
      }

      const completed = i + 1;
      if (completed % PROGRESS_INTERVAL === 0) {
        options.onProgress?.({ workerId: options.workerId, completed, total: options.requestsPerWorker });
      }

      if (options.thinkTimeMs > 0 && completed < options.requestsPerWorker) {
        await delay(options.thinkTimeMs);
      }
    }
  } finally {
    await options.client.close();
  }

  return results;
};
