/**
 * HTTP Client
 *
 * Thin wrapper over fetch with a per-request timeout and a connection-level
 * retry budget. HTTP error statuses are never retried; they are reported to
 * the caller as TransferError.
 */

import { TransferError, errorMessage } from './errors';
import type { Logger } from './rolling-logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface HttpRequestInit {
  method?: 'GET' | 'POST' | 'HEAD';
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type FetchFn = (url: string, init: HttpRequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutSeconds: number;
  retries: number;
  headers?: Record<string, string>;
  fetchFn?: FetchFn;
  logger?: Logger;
  // delay before retry n is backoffSeconds * 2^(n-1)
  backoffSeconds?: number;
}

/**
 * What the fetcher and vendor client need from the network
 */
export interface HttpTransport {
  request(url: string, init?: HttpRequestInit): Promise<Response>;
  requestOk(url: string, init?: HttpRequestInit): Promise<Response>;
  getJson(url: string, headers?: Record<string, string>): Promise<unknown>;
  getBuffer(url: string, headers?: Record<string, string>): Promise<Buffer>;
  getText(url: string, headers?: Record<string, string>): Promise<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────────────────

export class HttpClient implements HttpTransport {
  private readonly fetchFn: FetchFn;
  private readonly timeoutSeconds: number;
  private readonly retries: number;
  private readonly headers: Record<string, string>;
  private readonly backoffSeconds: number;
  private readonly logger?: Logger;

  constructor(options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutSeconds = options.timeoutSeconds;
    this.retries = options.retries;
    this.headers = options.headers ?? {};
    this.backoffSeconds = options.backoffSeconds ?? 0.1;
    this.logger = options.logger;
  }

  /**
   * A client sharing this one's settings with extra default headers (e.g. auth)
   */
  withHeaders(headers: Record<string, string>): HttpClient {
    return new HttpClient({
      timeoutSeconds: this.timeoutSeconds,
      retries: this.retries,
      headers: { ...this.headers, ...headers },
      fetchFn: this.fetchFn,
      logger: this.logger,
      backoffSeconds: this.backoffSeconds,
    });
  }

  /**
   * Send a request. Resolves with any HTTP status; rejects with TransferError
   * only when the connection itself keeps failing.
   */
  async request(url: string, init: HttpRequestInit = {}): Promise<Response> {
    const headers = { ...this.headers, ...(init.headers ?? {}) };
    let attempt = 0;

    for (;;) {
      try {
        return await this.fetchFn(url, {
          ...init,
          headers,
          signal: init.signal ?? AbortSignal.timeout(this.timeoutSeconds * 1000),
        });
      } catch (err) {
        if (attempt >= this.retries) {
          throw new TransferError(`Connection error for ${url}: ${errorMessage(err)}`, url, undefined, err);
        }
        attempt++;
        const delay = this.backoffSeconds * 2 ** (attempt - 1);
        this.logger?.debug(`[HTTP] Retrying ${url} in ${delay}s (${attempt}/${this.retries})`, {
          error: errorMessage(err),
        });
        await new Promise((resolve) => setTimeout(resolve, delay * 1000));
      }
    }
  }

  /**
   * Like request(), but a non-2xx status is a TransferError
   */
  async requestOk(url: string, init: HttpRequestInit = {}): Promise<Response> {
    const res = await this.request(url, init);
    if (!res.ok) {
      let detail = '';
      try {
        detail = (await res.text()).slice(0, 200);
      } catch {
        // body unavailable
      }
      this.logger?.debug(`[HTTP] ${res.status} from ${url}`, { body: detail });
      throw new TransferError(`HTTP ${res.status} for ${url}`, url, res.status);
    }
    return res;
  }

  async getJson(url: string, headers?: Record<string, string>): Promise<unknown> {
    const res = await this.requestOk(url, { headers: { Accept: 'application/json', ...(headers ?? {}) } });
    try {
      return await res.json();
    } catch (err) {
      throw new TransferError(`Invalid JSON from ${url}`, url, res.status, err);
    }
  }

  async getBuffer(url: string, headers?: Record<string, string>): Promise<Buffer> {
    const res = await this.requestOk(url, { headers });
    return Buffer.from(await res.arrayBuffer());
  }

  async getText(url: string, headers?: Record<string, string>): Promise<string> {
    const res = await this.requestOk(url, { headers });
    return res.text();
  }
}
