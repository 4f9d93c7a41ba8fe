import { InvalidStateError } from "../errors.js";
import { CookiePolicy, type FetchTransportConfig, type HttpRequest, type HttpTransport } from "./types.js";

/**
 * Transport over the WHATWG fetch API.
 * Socket timeout maps to `AbortSignal.timeout`; cookie suppression strips the Cookie header.
 */
export class FetchTransport implements HttpTransport<Response> {
  private readonly fetchFn: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;
  private closed = false;

  constructor(config?: FetchTransportConfig) {
    this.fetchFn = config?.fetch ?? fetch;
    this.defaultHeaders = config?.defaultHeaders ?? {};
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async send(request: HttpRequest): Promise<Response> {
    if (this.closed) {
      throw new InvalidStateError("Transport has been closed");
    }

    const headers: Record<string, string> = { ...this.defaultHeaders, ...request.headers };
    if (request.config.cookiePolicy === CookiePolicy.IGNORE) {
      for (const name of Object.keys(headers)) {
        if (name.toLowerCase() === "cookie") delete headers[name];
      }
    }

    const init: RequestInit = { method: request.method, headers };
    if (request.body !== undefined) init.body = request.body;
    if (request.config.socketTimeoutMs > 0) init.signal = AbortSignal.timeout(request.config.socketTimeoutMs);

    return this.fetchFn(request.url, init);
  }

  async release(response: Response): Promise<void> {
    if (response.body && !response.bodyUsed && !response.body.locked) {
      await response.body.cancel();
    }
  }

  /** After close, every send fails with InvalidStateError */
  close(): void {
    this.closed = true;
  }
}
