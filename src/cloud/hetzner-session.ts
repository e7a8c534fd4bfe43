/**
 * Authenticated HTTP session for the Hetzner API. Every request carries the
 * bearer token and JSON content type.
 */

export class HetznerApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown,
  ) {
    super(message);
    this.name = 'HetznerApiError';
  }
}

export interface HetznerSessionOptions {
  apiToken: string;
  baseUrl: string;
  /** Storage Box this session was opened for, if one is configured. */
  storageBox?: string | null;
  timeoutMs?: number;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: unknown;
  params?: QueryParams;
  headers?: Record<string, string>;
}

export class HetznerSession {
  readonly baseUrl: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly storageBox: string | null;
  private readonly timeoutMs: number;

  constructor(options: HetznerSessionOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = Object.freeze({
      Authorization: `Bearer ${options.apiToken}`,
      'Content-Type': 'application/json',
    });
    this.storageBox = options.storageBox ?? null;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  buildUrl(endpoint: string, params?: QueryParams): string {
    const normalized = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
    const url = new URL(`${this.baseUrl}${normalized}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /** Resolves to null when the response has no body. */
  async request<T>(endpoint: string, options: RequestOptions = {}): Promise<T | null> {
    const method = options.method ?? 'GET';
    const response = await fetch(this.buildUrl(endpoint, options.params), {
      method,
      headers: { ...this.headers, ...options.headers },
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new HetznerApiError(
        `Hetzner API ${method} ${endpoint} failed with HTTP ${response.status}`,
        response.status,
        parseErrorBody(text),
      );
    }
    if (text.length === 0) return null;
    const body: T = JSON.parse(text);
    return body;
  }

  get<T>(endpoint: string, params?: QueryParams): Promise<T | null> {
    return this.request<T>(endpoint, { method: 'GET', params });
  }

  post<T>(endpoint: string, body?: unknown): Promise<T | null> {
    return this.request<T>(endpoint, { method: 'POST', body });
  }

  put<T>(endpoint: string, body?: unknown): Promise<T | null> {
    return this.request<T>(endpoint, { method: 'PUT', body });
  }

  delete<T>(endpoint: string): Promise<T | null> {
    return this.request<T>(endpoint, { method: 'DELETE' });
  }
}

function parseErrorBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
