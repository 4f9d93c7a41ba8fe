export { FetchTransport } from "./fetch-transport.js";
export { createRequest, describeRequest } from "./request.js";
export type { CreateRequestInit } from "./request.js";
export { CookiePolicy } from "./types.js";
export type { FetchTransportConfig, HttpMethod, HttpRequest, HttpTransport, RequestConfig } from "./types.js";
