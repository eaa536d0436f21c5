import { buildConfig, parseArgs, usage } from './config';
import { logInfo, logWarn } from './logging';
import { createLoadTestMetrics } from './observability';
import { formatSummary, writeJsonReport, writeMetricsReport } from './report';
import { exitCodeFor, runLoadTest } from './runner';
import type { WorkerProgress } from './worker';

const logProgress = (progress: WorkerProgress): void => {
  logInfo(`Worker ${progress.workerId}: ${progress.completed}/${progress.total} requests`);
};

/** Run the harness for the given arguments and resolve to the process exit code. */
export const runCli = async (argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> => {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(usage());
    return 0;
  }

  const built = buildConfig(args, env);
  if (!built.ok) {
    logWarn('[loadtest] invalid configuration', { issues: built.errors });
    console.error(usage());
    return 1;
  }
  const config = built.config;

  logInfo('[loadtest] starting', {
    target: config.url,
    workers: config.workers,
    requestsPerWorker: config.requestsPerWorker,
    totalRequests: config.workers * config.requestsPerWorker,
    repositories: config.repos.length,
    seed: config.seed,
  });

  const metrics = createLoadTestMetrics();
  const { statistics } = await runLoadTest({
    ...config,
    metrics,
    onProgress: config.quiet ? undefined : logProgress,
  });

  logInfo(formatSummary(statistics));

  if (config.output) {
    await writeJsonReport(config.output, statistics);
    logInfo(`Results saved to ${config.output}`);
  }
  if (config.metricsOut) {
    await writeMetricsReport(config.metricsOut, metrics);
    logInfo(`Metrics saved to ${config.metricsOut}`);
  }

  const exitCode = exitCodeFor(statistics, config.minSuccessRate);
  if (exitCode !== 0) {
    logWarn(
      `[loadtest] success rate ${statistics.successRate.toFixed(2)}% is below ${config.minSuccessRate}%`,
    );
  }
  return exitCode;
};
