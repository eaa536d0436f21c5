import type { AdvertisedRef } from '@packload/pkt-line';

export type GitUploadPackClientOptions = {
  baseUrl: string;
  /** Per-call budget covering connect, response headers and body. Defaults to 60s. */
  timeoutMs?: number;
  /** Upper bound on sockets the client's pool keeps open to the target. */
  connections?: number;
  keepAliveTimeoutMs?: number;
};

export type ProtocolResult = {
  success: boolean;
  durationMs: number;
  servedBy: string;
  error: string;
};

export type LsRefsResult = ProtocolResult & {
  refs: AdvertisedRef[];
};
