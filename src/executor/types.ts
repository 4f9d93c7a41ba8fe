import type { TypedEventEmitter } from "../events.js";
import type { Logger } from "../types.js";

export interface ExecutorConfig {
  /** First backoff interval and lower bound of every later one (default: 1000) */
  minBackoffMs: number;
  /** Upper bound of the backoff interval (default: 16000) */
  maxBackoffMs: number;
  /** Retries made even once the retry timeout is exceeded (default: 1) */
  minRetryCount: number;
  /** Non-5xx codes treated as transient (default: [408, 403]) */
  retryableStatusCodes: readonly number[];
  /** Attempts that fail after running longer than this are logged at error level (default: 300000) */
  longAttemptThresholdMs: number;
  logger?: Logger;
  events?: TypedEventEmitter;
  /** Wall clock in epoch ms (default: Date.now) */
  clock?: () => number;
  /** Wait between attempts. A rejection counts as an interrupted sleep. */
  sleep?: (ms: number) => Promise<void>;
  /** Uniform source in [0, 1) for the backoff jitter */
  random?: () => number;
  /** Request guid source (default: crypto.randomUUID) */
  generateId?: () => string;
}

export interface ExecuteOptions {
  /** Budget in seconds for time spent on transient issues. <= 0 disables it (default: 0) */
  retryTimeoutSeconds?: number;
  /** Socket timeout forced onto the first attempt only. 0 disables it (default: 0) */
  injectSocketTimeoutMs?: number;
  /** Checked once per failed attempt; when aborted, retrying stops */
  signal?: AbortSignal;
  /** Force the IGNORE cookie policy on every attempt */
  withoutCookies?: boolean;
  /** Add `clientStartTime` to retried requests */
  includeRetryParameters?: boolean;
  /** Add a fresh `request_guid` to every attempt */
  includeRequestGuid?: boolean;
}

export type StopReason = "completed" | "cancelled" | "retry-timeout";

export interface ExecutionResult<T> {
  /** Final response. May carry a retryable status when stopReason is not "completed". */
  response: T | null;
  stopReason: StopReason;
  /** Number of sends made (retryCount + 1) */
  attempts: number;
  retryCount: number;
  totalLatencyMs: number;
  /** Time attributed to transient issues; only accounted while a retry timeout is set */
  transientElapsedMs: number;
}
