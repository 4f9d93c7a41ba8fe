/** Query parameter carrying the retry count on retried requests */
export const RETRY_COUNT_PARAM = "retryCount";
/** Query parameter carrying the epoch-ms start time of the logical call */
export const CLIENT_START_TIME_PARAM = "clientStartTime";
/** Query parameter carrying a fresh identifier on every attempt */
export const REQUEST_GUID_PARAM = "request_guid";

export const DEFAULT_SOCKET_TIMEOUT_MS = 300_000;

/** The only status code treated as a clean outcome when the loop exits */
export const SUCCESS_STATUS = 200;

export const DEFAULT_BACKOFF_CONFIG = {
  minIntervalMs: 1_000,
  maxIntervalMs: 16_000,
} as const;

export const DEFAULT_EXECUTOR_CONFIG = {
  minBackoffMs: DEFAULT_BACKOFF_CONFIG.minIntervalMs,
  maxBackoffMs: DEFAULT_BACKOFF_CONFIG.maxIntervalMs,
  // retry at least once even if the retry timeout has already been reached
  minRetryCount: 1,
  // 403 shows up transiently from the access layer in front of the service
  retryableStatusCodes: [408, 403] as readonly number[],
  longAttemptThresholdMs: 300_000,
} as const;
