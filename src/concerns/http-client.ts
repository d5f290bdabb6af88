import { DeadlineExceededError, HttpStatusError } from '../errors.js';

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Aborts the request; usually the collector's deadline signal. */
  signal?: AbortSignal;
  /**
   * Per-request ceiling in milliseconds. Without it a request carrying a
   * `signal` runs until that signal aborts; the client default only bounds
   * requests that have neither.
   */
  timeout?: number;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport used by HTTP collectors. Retries are owned by the orchestrator,
 * so implementations make exactly one request per call.
 */
export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

export interface HttpClientOptions {
  headers?: Record<string, string>;
  timeout?: number;
  userAgent?: string;
}

export function parseRetryAfter(retryAfter: string | null | undefined, now: number = Date.now()): number | null {
  if (!retryAfter) return null;

  const seconds = parseInt(retryAfter, 10);
  if (!isNaN(seconds)) {
    return seconds * 1000;
  }

  const date = Date.parse(retryAfter);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return null;
}

export class FetchHttpClient implements HttpClient {
  defaultHeaders: Record<string, string>;
  timeout: number;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.defaultHeaders = {
      Accept: 'application/json',
      'User-Agent': options.userAgent ?? 'osint-conductor',
      ...options.headers
    };
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const controller = new AbortController();
    const { signal } = options;
    const timeout = options.timeout ?? (signal ? undefined : this.timeout);
    const timeoutId = timeout === undefined
      ? null
      : setTimeout(() => controller.abort(new DeadlineExceededError('Request timed out')), timeout);

    const onAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: { ...this.defaultHeaders, ...options.headers },
        signal: controller.signal
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      return {
        status: response.status,
        ok: response.ok,
        headers,
        body: await response.text()
      };
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Throws an HttpStatusError for any status outside 2xx, except the ones the
 * caller treats as an ordinary answer (for example a 404 meaning "nothing found").
 */
export function expectOk(response: HttpResponse, url: string, allowed: readonly number[] = []): HttpResponse {
  if (response.ok || allowed.includes(response.status)) {
    return response;
  }
  throw new HttpStatusError(response.status, url, parseRetryAfter(response.headers['retry-after']));
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return new FetchHttpClient(options);
}

export default createHttpClient;
