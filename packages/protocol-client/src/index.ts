import { Agent, request } from 'undici';
import { encodeFetch, encodeLsRefs, parseRefAdvertisement } from '@packload/pkt-line';
import type { GitUploadPackClientOptions, LsRefsResult, ProtocolResult } from './types';

export const DEFAULT_TIMEOUT_MS = 60_000;

const DEFAULT_KEEP_ALIVE_MS = 30_000;

const UPLOAD_PACK_HEADERS = {
  'content-type': 'application/x-git-upload-pack-request',
  'git-protocol': 'version=2',
  accept: 'application/x-git-upload-pack-result',
};

type Exchange = {
  result: ProtocolResult;
  body: Buffer;
};

const headerValue = (value: string | string[] | undefined): string => {
  if (Array.isArray(value)) {
    return value.join(', ');
  }
  return value ?? '';
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
};

/**
 * Speaks Git protocol v2 over smart HTTP to a single upload-pack endpoint.
 * Every call resolves to a result; transport failures, timeouts and bad
 * responses are reported in it rather than thrown.
 *
 * Each instance keeps its own connection pool, so one client should belong
 * to one simulated user. Call `close()` when done with it.
 */
export class GitUploadPackClient {
  private baseUrl: string;
  private timeoutMs: number;
  private agent: Agent;

  constructor(options: GitUploadPackClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.agent = new Agent({
      connections: options.connections ?? null,
      keepAliveTimeout: options.keepAliveTimeoutMs ?? DEFAULT_KEEP_ALIVE_MS,
    });
  }

  buildUrl(repoPath: string): string {
    return `${this.baseUrl}/${repoPath.replace(/^\/+/, '')}/git-upload-pack`;
  }

  async lsRefs(repoPath: string): Promise<LsRefsResult> {
    const { result, body } = await this.post(repoPath, encodeLsRefs());
    return { ...result, refs: result.success ? parseRefAdvertisement(body) : [] };
  }

  async fetch(repoPath: string, wantRef: string): Promise<ProtocolResult> {
    const { result } = await this.post(repoPath, encodeFetch(wantRef));
    return result;
  }

  async close(): Promise<void> {
    await this.agent.close();
  }

  private async post(repoPath: string, payload: string): Promise<Exchange> {
    const start = process.hrtime.bigint();
    const elapsedMs = (): number => Number(process.hrtime.bigint() - start) / 1_000_000;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await request(this.buildUrl(repoPath), {
        method: 'POST',
        headers: UPLOAD_PACK_HEADERS,
        body: payload,
        dispatcher: this.agent,
        signal: controller.signal,
      });
      const body = Buffer.from(await response.body.arrayBuffer());
      const durationMs = elapsedMs();

      // Failed responses never name a backend.
      if (response.statusCode !== 200) {
        return { result: { success: false, durationMs, servedBy: '', error: `HTTP ${response.statusCode}` }, body };
      }
      if (body.length === 0) {
        return { result: { success: false, durationMs, servedBy: '', error: 'Empty response' }, body };
      }
      const servedBy = headerValue(response.headers['x-served-by']);
      return { result: { success: true, durationMs, servedBy, error: '' }, body };
    } catch (error) {
      const message = timedOut ? `Timeout after ${this.timeoutMs}ms` : describeError(error);
      return {
        result: { success: false, durationMs: elapsedMs(), servedBy: '', error: message },
        body: Buffer.alloc(0),
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

export type { GitUploadPackClientOptions, LsRefsResult, ProtocolResult } from './types';
