export interface HttpRequestOptions {
  query?: Record<string, string>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  /** Parsed JSON body; the raw text when a non-2xx body is not JSON. */
  body: unknown;
}

/**
 * Pluggable network client used by every live rate provider.
 * Network-level failures reject; HTTP error statuses resolve.
 */
export interface IHttpClient {
  getJson(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}
