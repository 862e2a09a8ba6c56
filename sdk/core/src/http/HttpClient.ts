import type { Dispatcher } from 'undici';
import { HttpError, NetworkError, TimeoutError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type HttpClientConfig = {
  baseUrl: string;
  /** Per-request timeout; requests run until the transport gives up when unset or 0. */
  timeoutMs?: number;
  defaultHeaders?: Record<string, string>;
  fetchImpl?: typeof fetch;
  /** undici dispatcher carrying the TLS settings; the global one when absent. */
  dispatcher?: Dispatcher;
};

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type RawBody = string | Uint8Array | ArrayBuffer;

export type RequestOptions = {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  query?: QueryParams;
  /**
   * Optional request body. Strings and byte arrays are sent as they are;
   * anything else is JSON-encoded with 'application/json' unless an explicit
   * Content-Type header is set.
   */
  body?: RawBody | unknown;
};

export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly fetchImpl: typeof fetch;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: HttpClientConfig) {
    if (!options.baseUrl) throw new Error('HttpClient: baseUrl is required');
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.timeoutMs = options.timeoutMs ?? 0;
    this.defaultHeaders = { Accept: 'application/json', ...(options.defaultHeaders ?? {}) };
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.dispatcher = options.dispatcher;
  }

  async request<T>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const headers = { ...this.defaultHeaders, ...(options.headers ?? {}) };

    // Support timeout via AbortController if no external signal provided
    const controller = !options.signal && this.timeoutMs > 0 ? new AbortController() : undefined;
    const signal = options.signal ?? controller?.signal;

    const timer: ReturnType<typeof setTimeout> | undefined = controller
      ? setTimeout(() => controller.abort(), this.timeoutMs)
      : undefined;

    try {
      const hasExplicitContentType = Object.keys(headers).some(
        (h) => h.toLowerCase() === 'content-type',
      );
      const candidate = options.body;
      let body: RawBody | null = null;
      if (candidate !== undefined && candidate !== null) {
        if (this.isRawBody(candidate)) {
          body = candidate;
        } else {
          if (!hasExplicitContentType) headers['Content-Type'] = 'application/json';
          body = JSON.stringify(candidate);
        }
      }

      const init: RequestInit = {
        method,
        headers,
        ...(signal ? { signal } : {}),
        ...(body !== null ? { body } : {}),
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      };
      const res = await this.fetchImpl(url, init);

      // If the response is not OK, consume body for error details and throw
      if (!res.ok) {
        const text = await res.text();
        const maybeJson = this.parseJsonSafely(text);
        throw new HttpError(`HTTP ${res.status} for ${method} ${url}`, res.status, maybeJson ?? text);
      }

      const text = await res.text();
      const maybeJson = this.parseJsonSafely(text);
      return (maybeJson ?? text) as T;
    } catch (err: unknown) {
      if (this.isAbortError(err)) {
        throw new TimeoutError(`Request timed out for ${method} ${path}`);
      }
      if (err instanceof HttpError) throw err;
      const msg = this.getErrorMessage(err);
      throw new NetworkError(msg ?? `Network error for ${method} ${path}`, { cause: err });
    } finally {
      if (timer) clearTimeout(timer);
    }
  }

  get<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('GET', path, options);
  }

  post<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('POST', path, options);
  }

  put<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('PUT', path, options);
  }

  delete<T>(path: string, options?: RequestOptions): Promise<T> {
    return this.request<T>('DELETE', path, options);
  }

  private buildUrl(path: string, query?: QueryParams): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    const url = new URL(this.baseUrl + normalizedPath);

    if (query) {
      for (const [k, v] of Object.entries(query)) {
        if (v === undefined) continue;
        url.searchParams.set(k, String(v));
      }
    }

    return url.toString();
  }

  private parseJsonSafely(text: string): unknown | undefined {
    if (!text) return undefined;
    try {
      return JSON.parse(text);
    } catch {
      return undefined;
    }
  }

  private isRawBody(value: unknown): value is RawBody {
    return typeof value === 'string' || value instanceof Uint8Array || value instanceof ArrayBuffer;
  }

  private isAbortError(err: unknown): err is { name: string } {
    return (
      typeof err === 'object' &&
      err !== null &&
      'name' in err &&
      (err as { name?: unknown }).name === 'AbortError'
    );
  }

  private getErrorMessage(err: unknown): string | undefined {
    if (typeof err === 'string') return err;
    if (typeof err === 'object' && err !== null && 'message' in err) {
      const m = (err as { message?: unknown }).message;
      if (typeof m === 'string') return m;
    }
    return undefined;
  }
}
