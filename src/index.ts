// Executor
export { RestRequestExecutor, RestRequestExecutorBuilder } from "./executor/index.js";
export type { ExecuteOptions, ExecutionResult, ExecutorConfig, StopReason } from "./executor/index.js";

// Backoff
export { DecorrelatedJitterBackoff } from "./backoff/index.js";
export type { BackoffConfig } from "./backoff/index.js";

// Classification
export { classifyFault, classifyStatus, isInvalidState, isRetryableStatus, StatusReason } from "./retry/index.js";
export type { FaultClassification, StatusClassification } from "./retry/index.js";

// Tracing
export { RequestTracer } from "./tracing/index.js";
export type { StampOptions } from "./tracing/index.js";

// Transport
export { CookiePolicy, createRequest, describeRequest, FetchTransport } from "./transport/index.js";
export type {
  CreateRequestInit,
  FetchTransportConfig,
  HttpMethod,
  HttpRequest,
  HttpTransport,
  RequestConfig,
} from "./transport/index.js";

// Shared
export { RestRequestError, RestRequestErrorCode, InvalidStateError } from "./errors.js";
export { TypedEventEmitter, RequestEvent } from "./events.js";
export type { RequestEventMap } from "./events.js";
export type { Logger, Result, StatusLine } from "./types.js";
export {
  CLIENT_START_TIME_PARAM,
  DEFAULT_EXECUTOR_CONFIG,
  DEFAULT_SOCKET_TIMEOUT_MS,
  REQUEST_GUID_PARAM,
  RETRY_COUNT_PARAM,
} from "./constants.js";
export { createDefaultLogger } from "./logger.js";
