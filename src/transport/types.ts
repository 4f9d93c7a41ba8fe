import type { StatusLine } from "../types.js";

export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS";

export enum CookiePolicy {
  DEFAULT = "default",
  /** Send no cookies with the request */
  IGNORE = "ignore",
}

/** Per-attempt transport settings. The executor overrides these between attempts. */
export interface RequestConfig {
  /** Socket/read timeout in ms. 0 = no timeout */
  socketTimeoutMs: number;
  cookiePolicy: CookiePolicy;
}

/**
 * Outgoing request. Owned by the caller and mutated in place by the executor:
 * query parameters and `config` change between attempts, nothing else does.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: string | Uint8Array | undefined;
  config: RequestConfig;
}

export interface HttpTransport<TResponse extends StatusLine = StatusLine> {
  /** Send one attempt. Throws on transport faults; an `InvalidStateError` is never retried. */
  send(request: HttpRequest): Promise<TResponse>;
  /** Free whatever the attempt holds (connection, unread body) before the response is discarded */
  release(response: TResponse): Promise<void> | void;
}

export interface FetchTransportConfig {
  /** Defaults to the global fetch */
  fetch?: typeof fetch;
  /** Headers added to every request unless the request sets them */
  defaultHeaders?: Record<string, string>;
}
