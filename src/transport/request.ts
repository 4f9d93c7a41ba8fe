import { DEFAULT_SOCKET_TIMEOUT_MS } from "../constants.js";
import { CookiePolicy, type HttpMethod, type HttpRequest, type RequestConfig } from "./types.js";

export interface CreateRequestInit {
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
  config?: Partial<RequestConfig>;
}

export function createRequest(url: string | URL, init?: CreateRequestInit): HttpRequest {
  return {
    method: init?.method ?? "GET",
    url: new URL(url),
    headers: { ...init?.headers },
    body: init?.body,
    config: {
      socketTimeoutMs: DEFAULT_SOCKET_TIMEOUT_MS,
      cookiePolicy: CookiePolicy.DEFAULT,
      ...init?.config,
    },
  };
}

/** `METHOD url` for log lines and events */
export function describeRequest(request: HttpRequest): string {
  return `${request.method} ${request.url.toString()}`;
}
