import { z } from 'zod';

export const DEFAULT_URL = 'http://localhost:8080';

export const DEFAULT_REPOS = [
  'github.com/kubernetes/kubernetes',
  'github.com/golang/go',
  'github.com/torvalds/linux',
  'github.com/hashicorp/terraform',
];

export const wantRefSources = ['placeholder', 'discovered'] as const;

export type WantRefSource = (typeof wantRefSources)[number];

export const loadTestConfigSchema = z.object({
  url: z.string().url().default(DEFAULT_URL),
  workers: z.coerce.number().int().positive().default(10),
  requestsPerWorker: z.coerce.number().int().nonnegative().default(100),
  thinkTimeMs: z.coerce.number().nonnegative().default(100),
  repos: z.array(z.string().min(1)).min(1).default(DEFAULT_REPOS),
  output: z.string().min(1).optional(),
  metricsOut: z.string().min(1).optional(),
  timeoutMs: z.coerce.number().int().positive().default(60_000),
  seed: z.coerce.number().int().nonnegative().optional(),
  lsRefsRatio: z.coerce.number().min(0).max(1).default(0.8),
  wantRefSource: z.enum(wantRefSources).default('placeholder'),
  minSuccessRate: z.coerce.number().min(0).max(100).default(95),
  quiet: z.boolean().default(false),
});

export type LoadTestConfig = z.infer<typeof loadTestConfigSchema>;

export type ConfigResult = { ok: true; config: LoadTestConfig } | { ok: false; errors: string[] };

type FlagSpec = {
  key: keyof LoadTestConfig;
  flag: string;
  env: string;
};

const FLAGS: FlagSpec[] = [
  { key: 'url', flag: 'url', env: 'PACKLOAD_URL' },
  { key: 'workers', flag: 'workers', env: 'PACKLOAD_WORKERS' },
  { key: 'requestsPerWorker', flag: 'requests', env: 'PACKLOAD_REQUESTS' },
  { key: 'thinkTimeMs', flag: 'think-time', env: 'PACKLOAD_THINK_TIME_MS' },
  { key: 'output', flag: 'output', env: 'PACKLOAD_OUTPUT' },
  { key: 'metricsOut', flag: 'metrics-out', env: 'PACKLOAD_METRICS_OUT' },
  { key: 'timeoutMs', flag: 'timeout', env: 'PACKLOAD_TIMEOUT_MS' },
  { key: 'seed', flag: 'seed', env: 'PACKLOAD_SEED' },
  { key: 'lsRefsRatio', flag: 'ls-refs-ratio', env: 'PACKLOAD_LS_REFS_RATIO' },
  { key: 'wantRefSource', flag: 'want-ref', env: 'PACKLOAD_WANT_REF' },
  { key: 'minSuccessRate', flag: 'min-success-rate', env: 'PACKLOAD_MIN_SUCCESS_RATE' },
];

const KNOWN_FLAGS = new Set([...FLAGS.map((spec) => spec.flag), 'repos', 'quiet', 'help']);

export const usage = (): string => {
  return `packload [options]

Generates concurrent Git protocol v2 traffic against an upload-pack proxy.

Options:
  --url <url>                 target base URL (default ${DEFAULT_URL})
  --workers <n>               concurrent simulated clients (default 10)
  --requests <n>              requests per worker (default 100)
  --think-time <ms>           pause between a worker's requests (default 100)
  --repos <path,...>          repository paths to draw from
  --output <file>             write statistics as JSON
  --metrics-out <file>        write Prometheus metrics for the run
  --timeout <ms>              per-request timeout (default 60000)
  --seed <n>                  seed repository and operation selection
  --ls-refs-ratio <0..1>      share of ls-refs requests (default 0.8)
  --want-ref placeholder|discovered
                              fetch the all-zero id or a ref seen in ls-refs
  --min-success-rate <pct>    exit 1 below this success rate (default 95)
  --quiet                     no progress lines
  --help
`;
};

/**
 * Collect `--flag value` and `--flag=value` pairs. A flag followed by several
 * plain values keeps them comma-joined, so `--repos a b` reads like
 * `--repos a,b`. A bare flag is recorded as `'true'`.
 */
export const parseArgs = (args: string[]): Record<string, string> => {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const separator = token.indexOf('=');
    if (separator > 2) {
      result[token.slice(2, separator)] = token.slice(separator + 1);
      continue;
    }
    const key = token.slice(2);
    const values: string[] = [];
    while (i + 1 < args.length && !args[i + 1].startsWith('--')) {
      values.push(args[i + 1]);
      i += 1;
    }
    result[key] = values.length > 0 ? values.join(',') : 'true';
  }
  return result;
};

export const parseList = (value?: string): string[] | undefined => {
  return value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

/**
 * Resolve the run configuration. Each option comes from its flag, then its
 * `PACKLOAD_*` environment variable, then the default. Flags it does not
 * know are reported alongside schema issues.
 */
export const buildConfig = (
  args: Record<string, string>,
  env: NodeJS.ProcessEnv = process.env,
): ConfigResult => {
  const raw: Record<string, unknown> = {};
  for (const spec of FLAGS) {
    const value = args[spec.flag] ?? env[spec.env];
    if (value !== undefined && value !== '') {
      raw[spec.key] = value;
    }
  }

  const repos = args.repos ?? env.PACKLOAD_REPOS;
  if (repos !== undefined) {
    raw.repos = parseList(repos);
  }
  const quiet = args.quiet ?? env.PACKLOAD_QUIET;
  if (quiet !== undefined) {
    raw.quiet = quiet.toLowerCase() === 'true';
  }

  const unknown = Object.keys(args)
    .filter((key) => !KNOWN_FLAGS.has(key))
    .map((key) => `--${key}: unknown option`);

  const parsed = loadTestConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, errors: [...unknown, ...toErrors(parsed.error.issues)] };
  }
  if (unknown.length > 0) {
    return { ok: false, errors: unknown };
  }
  return { ok: true, config: parsed.data };
};
