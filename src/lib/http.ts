/**
 * HTTP Client
 * Thin wrapper around fetch with a per-request timeout, default headers and
 * JSON handling. Used by every data source and webhook notifier.
 */

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpClientOptions {
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON body, or null when the body is empty or not JSON */
  body: unknown;
}

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, url: string) {
    super(`Request to ${stripQuery(url)} failed with status ${status}`);
    this.name = 'HttpError';
    this.status = status;
  }
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

function stripQuery(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class HttpClient {
  private fetchImpl: typeof fetch;
  private timeoutMs: number;
  private headers: Record<string, string>;

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.headers = options.headers ?? {};
  }

  /**
   * GET a JSON document. Throws HttpError on a non-2xx status.
   */
  async getJson(url: string, params?: QueryParams, headers?: Record<string, string>): Promise<unknown> {
    const target = buildUrl(url, params);
    const response = await this.request(target, { method: 'GET', headers });
    if (!response.ok) {
      throw new HttpError(response.status, target);
    }
    return response.body;
  }

  /**
   * POST an url-encoded form and return the JSON body. Throws HttpError on a non-2xx status.
   */
  async postForm(url: string, form: Record<string, string>, headers?: Record<string, string>): Promise<unknown> {
    const response = await this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...headers },
      body: new URLSearchParams(form).toString(),
    });
    if (!response.ok) {
      throw new HttpError(response.status, url);
    }
    return response.body;
  }

  /**
   * POST a JSON payload. Non-2xx responses are returned, not thrown,
   * so callers can inspect provider error bodies.
   */
  async postJson(url: string, payload: unknown, headers?: Record<string, string>): Promise<HttpResponse> {
    return this.request(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(payload),
    });
  }

  private async request(
    url: string,
    init: { method: 'GET' | 'POST'; headers?: Record<string, string>; body?: string }
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: init.method,
        headers: { ...this.headers, ...init.headers },
        body: init.body,
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, ok: response.ok, body: parseBody(text) };
    } finally {
      clearTimeout(timeout);
    }
  }
}
