import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';

import { ErrorCode } from '@/lib/errors/error-codes';
import { ClientError, transportError } from '@/lib/errors/error';

import type { ApiStats } from './types';

export type TransportRequest = {
  payload: string;
  headers: Record<string, string>;
  signal?: AbortSignal;
};

export type TransportResponse = {
  status: number;
  headers: Record<string, string>;
  body: string;
};

/** Raw send/receive capability. A non-2xx status is a response, not a failure. */
export type Transport = {
  call: (request: TransportRequest) => Promise<TransportResponse>;
};

function normalizeHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    out[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

export function createHttpTransport(input: { endpoint: string; strictTls: boolean; timeoutMs: number }): Transport {
  const url = new URL(input.endpoint);
  const isHttps = url.protocol === 'https:';
  const reqFn = isHttps ? httpsRequest : httpRequest;

  const call = (request: TransportRequest) =>
    new Promise<TransportResponse>((resolve, reject) => {
      const body = Buffer.from(request.payload, 'utf8');
      const req = reqFn(
        {
          protocol: url.protocol,
          hostname: url.hostname,
          port: url.port ? Number(url.port) : undefined,
          path: `${url.pathname}${url.search}`,
          method: 'POST',
          headers: {
            ...request.headers,
            'content-length': String(body.length),
          },
          signal: request.signal,
          ...(isHttps ? { rejectUnauthorized: input.strictTls } : {}),
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk))));
          res.on('error', (err) => reject(err));
          res.on('end', () => {
            resolve({
              status: res.statusCode ?? 0,
              headers: normalizeHeaders(res.headers),
              body: Buffer.concat(chunks).toString('utf8'),
            });
          });
        },
      );

      req.on('error', (err) => reject(err));
      req.setTimeout(input.timeoutMs, () => {
        req.destroy(new Error('socket timeout'));
      });
      req.write(body);
      req.end();
    });

  return { call };
}

export type PacedResponse = TransportResponse & { latencyMs: number };

export type PacedTransportOptions = {
  /** Minimum spacing between the start times of two calls. */
  minIntervalMs: number;
  timeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wraps a Transport with a process-wide start-time gate, a per-call timeout and latency statistics.
 * Start slots are reserved synchronously, so concurrent callers are spaced like sequential ones.
 */
export class PacedTransport {
  private readonly inner: Transport;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  private nextSlotAt = Number.NEGATIVE_INFINITY;
  private totals: ApiStats = { totalCalls: 0, totalTimeMs: 0, averageMs: 0, lastMs: 0 };

  constructor(inner: Transport, options: PacedTransportOptions) {
    this.inner = inner;
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => Date.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  stats(): ApiStats {
    return { ...this.totals };
  }

  async call(payload: string, headers: Record<string, string>, signal?: AbortSignal): Promise<PacedResponse> {
    await this.waitForSlot();
    if (signal?.aborted) {
      throw transportError({ code: ErrorCode.TRANSPORT_ABORTED, message: 'call aborted before start' });
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(this.timeoutError());
        controller.abort();
      }, this.timeoutMs);
    });

    const started = this.now();
    try {
      const res = await Promise.race([this.inner.call({ payload, headers, signal: controller.signal }), timeout]);
      return { ...res, latencyMs: this.now() - started };
    } catch (err) {
      if (timedOut) throw this.timeoutError();
      if (signal?.aborted) {
        throw transportError({ code: ErrorCode.TRANSPORT_ABORTED, message: 'call aborted' });
      }
      if (err instanceof ClientError) throw err;
      const cause = err instanceof Error ? err.message : String(err);
      throw transportError({
        code: ErrorCode.TRANSPORT_FAILED,
        message: `transport failed: ${cause}`,
        redacted_context: { cause },
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
      this.record(this.now() - started);
    }
  }

  private timeoutError(): ClientError {
    return transportError({
      code: ErrorCode.TRANSPORT_TIMEOUT,
      message: `call timed out after ${this.timeoutMs}ms`,
      redacted_context: { timeout_ms: this.timeoutMs },
    });
  }

  private async waitForSlot() {
    if (this.minIntervalMs === 0) return;
    const now = this.now();
    const startAt = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = startAt + this.minIntervalMs;
    if (startAt > now) await this.sleep(startAt - now);
  }

  private record(latencyMs: number) {
    const totalCalls = this.totals.totalCalls + 1;
    const totalTimeMs = this.totals.totalTimeMs + latencyMs;
    this.totals = { totalCalls, totalTimeMs, averageMs: totalTimeMs / totalCalls, lastMs: latencyMs };
  }
}
