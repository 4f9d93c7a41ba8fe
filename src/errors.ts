/** Error codes for all rest-retry-kit error types */
export enum RestRequestErrorCode {
  /** The transport can no longer send (closed, shut down). Never retried. */
  INVALID_STATE = "INVALID_STATE",
  /** Retry budget exhausted without ever receiving a response */
  NETWORK_ERROR = "NETWORK_ERROR",

  INVALID_CONFIG = "INVALID_CONFIG",
}

/** Structured error with a machine-readable code and optional cause/context */
export class RestRequestError extends Error {
  readonly code: RestRequestErrorCode;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(
    code: RestRequestErrorCode,
    message: string,
    options?: { cause?: Error | undefined; context?: Record<string, unknown> | undefined },
  ) {
    super(message);
    this.name = "RestRequestError";
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
  }
}

/** Raised by a transport that has been closed or is otherwise unable to send */
export class InvalidStateError extends Error {
  readonly code = "ERR_INVALID_STATE";

  constructor(message: string) {
    super(message);
    this.name = "InvalidStateError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
