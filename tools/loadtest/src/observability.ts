import { Counter, Histogram, Registry } from 'prom-client';
import { trace } from '@opentelemetry/api';
import type { TestResult } from '@packload/stats';

export type LoadTestMetrics = {
  registry: Registry;
  requests: Counter<'operation' | 'status'>;
  requestDuration: Histogram<'operation'>;
};

/** Metrics are scoped to one run so that separate runs never share counters. */
export const createLoadTestMetrics = (): LoadTestMetrics => {
  const registry = new Registry();
  return {
    registry,
    requests: new Counter({
      name: 'packload_requests_total',
      help: 'Requests issued against the upload-pack endpoint',
      labelNames: ['operation', 'status'],
      registers: [registry],
    }),
    requestDuration: new Histogram({
      name: 'packload_request_duration_seconds',
      help: 'Wall-clock latency of upload-pack requests',
      labelNames: ['operation'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.3, 1, 3, 10, 60],
      registers: [registry],
    }),
  };
};

export const recordResult = (metrics: LoadTestMetrics, result: TestResult): void => {
  metrics.requests.inc({ operation: result.operation, status: result.success ? 'success' : 'failure' });
  metrics.requestDuration.observe({ operation: result.operation }, result.durationMs / 1000);
};

export const loadTestTracer = trace.getTracer('loadtest');
