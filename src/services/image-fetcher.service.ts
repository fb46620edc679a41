import http, { type IncomingHttpHeaders } from 'http';
import https from 'https';

import { createChildLogger } from '../utils/logger.js';
import { DownloadError, toError, type DownloadFailureReason, type FetchAttempt } from '../utils/errors.js';
import { RawImage } from '../utils/raw-image.js';
import { nanosToMillis, startNanoTimer } from '../utils/timer.js';
import { ConnectionPool, type ConnectionPoolOptions, type PoolLease } from './connection-pool.js';
import type { MetricsCollector } from './metrics.service.js';

const logger = createChildLogger({ service: 'image-fetcher' });

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;
export const MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * HTTP Agent configuration for pooled connections.
 * One socket per agent so a pool entry stands for exactly one connection.
 */
const HTTP_AGENT_CONFIG = {
  keepAlive: true,
  maxSockets: 1,
  keepAliveMsecs: 3000,
} as const;

export type FetchSource = 'primary' | 'fallback';

export type FetchResult =
  | { ok: true; image: RawImage; source: FetchSource }
  | { ok: false; error: DownloadError };

export interface HttpResponse {
  statusCode: number;
  headers: IncomingHttpHeaders;
  body: Buffer;
}

/**
 * Performs one GET and buffers the whole body. Must honour the abort signal.
 */
export type HttpTransport = (url: URL, agent: http.Agent, signal: AbortSignal) => Promise<HttpResponse>;

export const nodeHttpTransport: HttpTransport = (url, agent, signal) =>
  new Promise((resolve, reject) => {
    const client = url.protocol === 'https:' ? https : http;
    const req = client.request(
      url,
      { method: 'GET', agent, signal, headers: { accept: 'image/*' } },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          resolve({ statusCode: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) });
        });
      }
    );

    req.on('error', reject);
    req.end();
  });

/**
 * A pooled keep-alive connection. Agents are created per protocol on first use.
 */
export class HttpConnection {
  private httpAgent: http.Agent | null = null;
  private httpsAgent: https.Agent | null = null;

  agentFor(url: URL): http.Agent {
    if (url.protocol === 'https:') {
      this.httpsAgent ??= new https.Agent(HTTP_AGENT_CONFIG);
      return this.httpsAgent;
    }
    this.httpAgent ??= new http.Agent(HTTP_AGENT_CONFIG);
    return this.httpAgent;
  }

  destroy(): void {
    this.httpAgent?.destroy();
    this.httpsAgent?.destroy();
    this.httpAgent = null;
    this.httpsAgent = null;
  }
}

export interface ImageFetcherOptions {
  primaryUrl: string;
  fallbackUrl: string;
  /** Deadline for primary plus fallback together */
  timeoutMs?: number;
  metrics?: MetricsCollector;
  pool?: Omit<ConnectionPoolOptions<HttpConnection>, 'factory' | 'name'>;
  transport?: HttpTransport;
}

type AttemptOutcome =
  | { ok: true; body: Buffer }
  | { ok: false; reason: Extract<DownloadFailureReason, 'status' | 'network' | 'pool'> };

/**
 * Resolve with the work, or reject as soon as the signal aborts even if the
 * work never settles.
 */
function abortable<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(toError(signal.reason));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(toError(error));
      }
    );
  });
}

/**
 * ImageFetcher - downloads the latest image from the primary source, with
 * exactly one fallback attempt, under a single overall deadline.
 */
export class ImageFetcher {
  private readonly primaryUrl: string;
  private readonly fallbackUrl: string;
  private readonly timeoutMs: number;
  private readonly metrics?: MetricsCollector;
  private readonly transport: HttpTransport;
  private readonly pool: ConnectionPool<HttpConnection>;

  constructor(options: ImageFetcherOptions) {
    this.primaryUrl = options.primaryUrl;
    this.fallbackUrl = options.fallbackUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.metrics = options.metrics;
    this.transport = options.transport ?? nodeHttpTransport;
    this.pool = new ConnectionPool<HttpConnection>({
      ...options.pool,
      name: 'image-fetcher',
      factory: {
        create: () => new HttpConnection(),
        destroy: (connection) => connection.destroy(),
      },
    });
  }

  /**
   * Fetch one image. Never rejects: failures come back as `{ ok: false }`.
   */
  async fetch(primaryUrl: string = this.primaryUrl, signal?: AbortSignal): Promise<FetchResult> {
    const attempts: FetchAttempt[] = [];
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onExternalAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', onExternalAbort, { once: true });
    }

    try {
      const { body, source } = await abortable(
        this.fetchWithFallback(primaryUrl, controller.signal, attempts),
        controller.signal
      );

      this.metrics?.recordDownload(body.length);
      return { ok: true, image: new RawImage(body), source };
    } catch (error) {
      if (timedOut) {
        return {
          ok: false,
          error: new DownloadError(`Image fetch timed out after ${this.timeoutMs}ms`, 'timeout', attempts),
        };
      }
      if (controller.signal.aborted) {
        return { ok: false, error: new DownloadError('Image fetch aborted', 'aborted', attempts) };
      }
      if (error instanceof DownloadError) {
        return { ok: false, error };
      }
      return { ok: false, error: new DownloadError(toError(error).message, 'network', attempts) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  async close(): Promise<void> {
    await this.pool.close();
  }

  private async fetchWithFallback(
    primaryUrl: string,
    signal: AbortSignal,
    attempts: FetchAttempt[]
  ): Promise<{ body: Buffer; source: FetchSource }> {
    const primary = await this.attempt('primary', primaryUrl, signal, attempts);
    if (primary.ok) {
      return { body: primary.body, source: 'primary' };
    }

    const fallback = await this.attempt('fallback', this.fallbackUrl, signal, attempts);
    if (fallback.ok) {
      return { body: fallback.body, source: 'fallback' };
    }

    throw new DownloadError('Primary and fallback image sources both failed', fallback.reason, attempts);
  }

  /**
   * One GET against one source. Abort errors propagate; everything else is
   * recorded and reported as a failed outcome.
   */
  private async attempt(
    source: FetchSource,
    url: string,
    signal: AbortSignal,
    attempts: FetchAttempt[]
  ): Promise<AttemptOutcome> {
    const elapsed = startNanoTimer();

    let lease: PoolLease<HttpConnection>;
    try {
      lease = await this.pool.acquire(signal);
    } catch (error) {
      if (signal.aborted) throw error;
      const message = toError(error).message;
      attempts.push({ url, source, error: message, durationMs: nanosToMillis(elapsed()) });
      logger.warn({ url, source, error: message }, 'No connection available for image fetch');
      return { ok: false, reason: 'pool' };
    }

    try {
      const response = await this.get(new URL(url), lease.resource, signal);
      const durationMs = nanosToMillis(elapsed());

      if (response.statusCode >= 200 && response.statusCode < 300) {
        attempts.push({ url, source, statusCode: response.statusCode, durationMs });
        logger.debug({ url, source, bytes: response.body.length, durationMs }, 'Image fetched');
        return { ok: true, body: response.body };
      }

      attempts.push({ url, source, statusCode: response.statusCode, error: `HTTP ${response.statusCode}`, durationMs });
      logger.warn({ url, source, statusCode: response.statusCode, durationMs }, 'Image source returned an error status');
      return { ok: false, reason: 'status' };
    } catch (error) {
      if (signal.aborted) throw error;
      const message = toError(error).message;
      attempts.push({ url, source, error: message, durationMs: nanosToMillis(elapsed()) });
      logger.warn({ url, source, error: message }, 'Image fetch attempt failed');
      return { ok: false, reason: 'network' };
    } finally {
      lease.release();
    }
  }

  private async get(url: URL, connection: HttpConnection, signal: AbortSignal): Promise<HttpResponse> {
    let target = url;
    for (let hop = 0; hop <= MAX_REDIRECTS; hop++) {
      const response = await this.transport(target, connection.agentFor(target), signal);
      const location = response.headers.location;
      if (!REDIRECT_STATUSES.has(response.statusCode) || !location) {
        return response;
      }
      target = new URL(location, target);
    }
    throw new Error(`Too many redirects fetching ${url.href}`);
  }
}
