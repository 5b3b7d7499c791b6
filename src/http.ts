import got, { HTTPError, type Got, type Response } from 'got';
import pLimit from 'p-limit';
import fs from 'node:fs';
import http from 'node:http';
import https from 'node:https';
import path from 'node:path';
import { Transform, type TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { partPath } from './paths.js';
import type { DownloadOutcome } from './types.js';
import { sleep } from './utils.js';

export const RETRY_STATUS_CODES = [500, 502, 503, 504];
const MAX_BACKOFF_MS = 10000;

type HttpOptions = {
  userAgent?: string;
  timeoutMs?: number;
  delayMs?: number;
  concurrency?: number;
  retryLimit?: number;
  retryBackoffMs?: number;
  certificateAuthority?: string; // extra trusted CA (PEM) for https endpoints
};

export type PageRequest = {
  searchParams?: Record<string, string | number>;
  headers?: Record<string, string>;
};

export type TransferOptions = {
  minSizeKB: number;
  maxSizeKB: number; // -1 = unbounded
  noRedirects: boolean;
};

export class SizeLimitError extends Error {
  constructor(readonly limitBytes: number) {
    super(`response body exceeds ${limitBytes} bytes`);
    this.name = 'SizeLimitError';
  }
}

/**
 * Delay in ms before retry number `attemptCount`, 0 meaning "do not retry".
 * `computedValue` is got's own verdict: 0 once the limit is spent or the failure is not retryable.
 * Only plain-http endpoints get retries; https requests fail on the first error.
 */
export function retryDelay(protocol: string, attemptCount: number, computedValue: number, backoffMs: number): number {
  if (computedValue === 0) return 0;
  if (protocol !== 'http:') return 0;
  return Math.max(1, Math.min(backoffMs * 2 ** (attemptCount - 1), MAX_BACKOFF_MS));
}

function protocolOf(url: string | URL | undefined): string {
  if (url === undefined) return '';
  try {
    return new URL(url.toString()).protocol;
  } catch {
    return '';
  }
}

/**
 * Process-scoped HTTP client. Owns its keep-alive agents, so call `close()` once the run is over.
 *
 * - `html()` goes through the retrying client (search pages).
 * - `probe()` and `download()` use single-shot clients that never retry.
 */
export class HttpClient {
  private httpAgent = new http.Agent({ keepAlive: true });
  private httpsAgent = new https.Agent({ keepAlive: true });

  private client: Got;
  private probeClient: Got;
  private transferClient: Got;

  private limit: ReturnType<typeof pLimit>;
  private delayMs: number;

  constructor(opts: HttpOptions = {}) {
    const { userAgent, timeoutMs, delayMs, concurrency, retryLimit, retryBackoffMs, certificateAuthority } = opts;
    const timeout = timeoutMs ?? 30000;
    const backoffMs = retryBackoffMs ?? 100;

    const base = got.extend({
      headers: userAgent ? { 'user-agent': userAgent } : undefined,
      agent: { http: this.httpAgent, https: this.httpsAgent },
      https: certificateAuthority ? { certificateAuthority } : undefined
    });

    this.client = base.extend({
      timeout: { request: timeout },
      retry: {
        limit: retryLimit ?? 5,
        methods: ['GET'],
        statusCodes: RETRY_STATUS_CODES,
        calculateDelay: ({ attemptCount, error, computedValue }) =>
          retryDelay(protocolOf(error.options.url), attemptCount, computedValue, backoffMs)
      }
    });
    this.probeClient = base.extend({
      timeout: { request: timeout },
      retry: { limit: 0 },
      throwHttpErrors: false
    });
    // Whole-request deadlines would cut off large files, so bound the wait for headers and socket idleness.
    this.transferClient = base.extend({
      timeout: { response: timeout, socket: timeout },
      retry: { limit: 0 },
      throwHttpErrors: false
    });

    this.limit = pLimit(Math.max(1, concurrency ?? 4));
    this.delayMs = Math.max(0, delayMs ?? 0);
  }

  async html(url: string, req: PageRequest = {}): Promise<string> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs);
      const res: Response<string> = await this.client.get(url, {
        searchParams: req.searchParams,
        headers: req.headers,
        responseType: 'text'
      });
      return res.body;
    });
  }

  // Status code of `url` after redirects, or 0 when no HTTP response came back at all.
  async probe(url: string): Promise<number> {
    return this.limit(async () => {
      if (this.delayMs) await sleep(this.delayMs);
      try {
        return await new Promise<number>((resolve, reject) => {
          const stream = this.probeClient.stream(url);
          stream.on('response', (res) => {
            resolve(res.statusCode ?? 0);
            stream.destroy();
          });
          stream.on('error', reject);
        });
      } catch (err) {
        if (err instanceof HTTPError) return err.response.statusCode;
        return 0;
      }
    });
  }

  /**
   * Streams `url` into `<outDir>/.<filename>.part` and renames it to `<outDir>/<filename>` once complete.
   * Redirects (with `noRedirects`) and size-bound misses resolve as `skipped`; transport errors and
   * HTTP error statuses throw. The part file never outlives a failed or rejected transfer.
   */
  async download(url: string, outDir: string, filename: string, opts: TransferOptions): Promise<DownloadOutcome> {
    return this.limit(async (): Promise<DownloadOutcome> => {
      if (this.delayMs) await sleep(this.delayMs);
      await fs.promises.mkdir(outDir, { recursive: true });
      const finalPath = path.join(outDir, filename);
      const tmpPath = partPath(outDir, filename);
      const minBytes = Math.max(0, opts.minSizeKB) * 1024;
      const maxBytes = opts.maxSizeKB < 0 ? Infinity : opts.maxSizeKB * 1024;

      const stream = this.transferClient.stream(url, { followRedirect: !opts.noRedirects });
      const response = await new Promise<http.IncomingMessage>((resolve, reject) => {
        stream.on('response', (res) => resolve(res));
        stream.on('error', reject);
      });

      const status = response.statusCode ?? 0;
      if (opts.noRedirects && status >= 300 && status < 400) {
        stream.destroy();
        return { status: 'skipped', url, reason: 'redirect' };
      }
      if (status >= 400) {
        stream.destroy();
        throw new Error(`HTTP ${status}`);
      }

      const lengthHeader = response.headers['content-length'];
      if (lengthHeader) {
        const declared = Number(lengthHeader);
        if (Number.isFinite(declared) && declared < minBytes) {
          stream.destroy();
          return { status: 'skipped', url, reason: 'too-small' };
        }
        if (Number.isFinite(declared) && declared > maxBytes) {
          stream.destroy();
          return { status: 'skipped', url, reason: 'too-large' };
        }
      }

      let bytes = 0;
      const counter = new Transform({
        transform(chunk: Buffer, _enc: BufferEncoding, cb: TransformCallback) {
          bytes += chunk.length;
          if (bytes > maxBytes) cb(new SizeLimitError(maxBytes));
          else cb(null, chunk);
        }
      });

      try {
        await pipeline(stream, counter, fs.createWriteStream(tmpPath));
      } catch (err) {
        await fs.promises.rm(tmpPath, { force: true });
        if (err instanceof SizeLimitError) return { status: 'skipped', url, reason: 'too-large' };
        throw err;
      }

      if (bytes < minBytes) {
        await fs.promises.rm(tmpPath, { force: true });
        return { status: 'skipped', url, reason: 'too-small' };
      }
      await fs.promises.rename(tmpPath, finalPath);
      return { status: 'saved', url, path: finalPath, bytes };
    });
  }

  close() {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
