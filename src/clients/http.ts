import { HttpError } from "../errors.js";

export type Query = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  query?: Query;
  json?: unknown;
  form?: Record<string, string>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly headers: Headers;
  readonly body: string;
}

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

/** Links the caller's signal with a per-request deadline. */
function deadline(signal: AbortSignal | undefined, timeoutMs: number): { signal: AbortSignal; release: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  const timer = setTimeout(() => controller.abort(new Error(`request timed out after ${timeoutMs}ms`)), timeoutMs);

  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    release: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    },
  };
}

/**
 * Shared fetch core for every vendor client: base URL, default headers,
 * timeout and status handling. Vendor clients hold one of these.
 */
export class HttpClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.headers = options.headers ?? {};
  }

  url(path: string, query?: Query): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /** Performs the request and reads the body; never throws on status. */
  async send(method: string, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const headers = new Headers({ Accept: "application/json", ...this.headers, ...options.headers });
    let body: string | undefined;
    if (options.json !== undefined) {
      headers.set("Content-Type", "application/json");
      body = JSON.stringify(options.json);
    } else if (options.form) {
      headers.set("Content-Type", "application/x-www-form-urlencoded");
      body = new URLSearchParams(options.form).toString();
    }

    const { signal, release } = deadline(options.signal, this.timeoutMs);
    try {
      const response = await fetch(this.url(path, options.query), { method, headers, body, signal });
      return {
        status: response.status,
        ok: response.ok,
        headers: response.headers,
        body: await response.text(),
      };
    } finally {
      release();
    }
  }

  /** Like `send`, but rejects with HttpError on a non-2xx status. */
  async request(method: string, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const response = await this.send(method, path, options);
    if (!response.ok) {
      throw new HttpError(response.status, response.body, this.url(path, options.query));
    }
    return response;
  }

  async getJson<T>(path: string, options: RequestOptions = {}): Promise<T> {
    const response = await this.request("GET", path, options);
    return JSON.parse(response.body) as T;
  }

  async postJson(path: string, json: unknown, options: RequestOptions = {}): Promise<void> {
    await this.request("POST", path, { ...options, json });
  }
}
