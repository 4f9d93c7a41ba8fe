import { EventEmitter } from "node:events";
import type { StopReason } from "./executor/types.js";

/** Request lifecycle events emitted by the executor */
export enum RequestEvent {
  ATTEMPT = "attempt",
  RETRYING = "retrying",
  /** A non-retryable, non-200 response ended the loop */
  NETWORK_ERROR = "network_error",
  LONG_ATTEMPT = "long_attempt",
  CANCELLED = "cancelled",
  RETRY_TIMEOUT = "retry_timeout",
  COMPLETED = "completed",
}

export interface RequestEventMap {
  [RequestEvent.ATTEMPT]: { request: string; retryCount: number; requestGuid?: string | undefined };
  [RequestEvent.RETRYING]: {
    request: string;
    retryCount: number;
    status: number | null;
    error?: Error | undefined;
    backoffMs: number;
    slept: boolean;
  };
  [RequestEvent.NETWORK_ERROR]: { statusCode: number; reason: string; request: string };
  [RequestEvent.LONG_ATTEMPT]: { request: string; elapsedMs: number };
  [RequestEvent.CANCELLED]: { request: string; retryCount: number };
  [RequestEvent.RETRY_TIMEOUT]: { request: string; transientElapsedMs: number; retryTimeoutMs: number };
  [RequestEvent.COMPLETED]: { request: string; status: number | null; attempts: number; stopReason: StopReason };
}

/** Type-safe event emitter for request lifecycle events. Subscribe via `.on(RequestEvent.*, handler)`. */
export class TypedEventEmitter extends EventEmitter {
  override emit<K extends RequestEvent>(event: K, data: RequestEventMap[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends RequestEvent>(event: K, listener: (data: RequestEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  override once<K extends RequestEvent>(event: K, listener: (data: RequestEventMap[K]) => void): this {
    return super.once(event, listener);
  }
}
