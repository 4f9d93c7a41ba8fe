import { DEFAULT_EXECUTOR_CONFIG } from "../constants.js";
import { InvalidStateError, RestRequestError, RestRequestErrorCode } from "../errors.js";

export enum StatusReason {
  SERVER_ERROR = "SERVER_ERROR",
  REQUEST_TIMEOUT = "REQUEST_TIMEOUT",
  FORBIDDEN = "FORBIDDEN",
  /** Listed in the configured retryable codes but not one of the well-known ones */
  CONFIGURED = "CONFIGURED",
  TERMINAL = "TERMINAL",
}

export interface StatusClassification {
  retryable: boolean;
  reason: StatusReason;
}

export interface FaultClassification {
  /** False only for invalid local state; every other transport fault is transient */
  retryable: boolean;
  errorType: string;
}

const NETWORK_ERROR_CODES = [
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
];

const INVALID_STATE_CODE = "ERR_INVALID_STATE";

/** Classify a response status code. 5xx is always retryable; other codes only when listed. */
export function classifyStatus(
  status: number,
  retryableStatusCodes: readonly number[] = DEFAULT_EXECUTOR_CONFIG.retryableStatusCodes,
): StatusClassification {
  if (status >= 500 && status <= 599) {
    return { retryable: true, reason: StatusReason.SERVER_ERROR };
  }
  if (retryableStatusCodes.includes(status)) {
    if (status === 408) return { retryable: true, reason: StatusReason.REQUEST_TIMEOUT };
    if (status === 403) return { retryable: true, reason: StatusReason.FORBIDDEN };
    return { retryable: true, reason: StatusReason.CONFIGURED };
  }
  return { retryable: false, reason: StatusReason.TERMINAL };
}

export function isRetryableStatus(status: number, retryableStatusCodes?: readonly number[]): boolean {
  return classifyStatus(status, retryableStatusCodes).retryable;
}

/** Classify a fault raised by the transport while sending */
export function classifyFault(error: Error): FaultClassification {
  if (isInvalidState(error)) {
    return { retryable: false, errorType: "INVALID_STATE" };
  }

  const code = errorCode(error);
  if (code && NETWORK_ERROR_CODES.includes(code)) {
    return { retryable: true, errorType: code };
  }

  // AbortSignal.timeout() rejects with a TimeoutError DOMException
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return { retryable: true, errorType: "TIMEOUT" };
  }

  // fetch wraps socket failures in a TypeError whose cause carries the code
  if (error.cause instanceof Error) {
    const causeCode = errorCode(error.cause);
    if (causeCode && NETWORK_ERROR_CODES.includes(causeCode)) {
      return { retryable: true, errorType: causeCode };
    }
  }

  return { retryable: true, errorType: "TRANSPORT_FAULT" };
}

export function isInvalidState(error: Error): boolean {
  if (error instanceof InvalidStateError) return true;
  if (error instanceof RestRequestError) return error.code === RestRequestErrorCode.INVALID_STATE;
  return errorCode(error) === INVALID_STATE_CODE;
}

function errorCode(error: Error): string | undefined {
  const code: unknown = (error as NodeJS.ErrnoException).code;
  return typeof code === "string" ? code : undefined;
}
