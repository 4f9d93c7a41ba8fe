import { DecorrelatedJitterBackoff } from "../backoff/decorrelated-jitter.js";
import { DEFAULT_EXECUTOR_CONFIG, SUCCESS_STATUS } from "../constants.js";
import { RestRequestError, RestRequestErrorCode, toError } from "../errors.js";
import { RequestEvent, TypedEventEmitter } from "../events.js";
import { createDefaultLogger } from "../logger.js";
import { classifyFault, classifyStatus } from "../retry/classifier.js";
import { RequestTracer } from "../tracing/request-tracer.js";
import { describeRequest } from "../transport/request.js";
import { CookiePolicy, type HttpRequest, type HttpTransport } from "../transport/types.js";
import type { Logger, Result, StatusLine } from "../types.js";
import { sleep } from "../utils.js";
import { RestRequestExecutorBuilder } from "./builder.js";
import type { ExecuteOptions, ExecutionResult, ExecutorConfig, StopReason } from "./types.js";

/**
 * Drives one HTTP request to completion through transient faults and
 * retryable responses.
 *
 * Each iteration stamps the request, sends it, and classifies the outcome.
 * A terminal status ends the loop. Anything else is retried after a
 * decorrelated-jitter backoff until the caller aborts, or until the time spent
 * on transient issues exceeds the retry timeout (after `minRetryCount` retries).
 */
export class RestRequestExecutor {
  readonly events: TypedEventEmitter;
  private readonly config: Readonly<ExecutorConfig>;
  private readonly logger: Logger;
  private readonly backoff: DecorrelatedJitterBackoff;
  private readonly tracer: RequestTracer;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  /** Prefer {@link RestRequestExecutor.builder} for construction. */
  constructor(config?: Partial<ExecutorConfig>) {
    this.config = { ...DEFAULT_EXECUTOR_CONFIG, ...config };
    this.logger = this.config.logger ?? createDefaultLogger();
    this.events = this.config.events ?? new TypedEventEmitter();
    this.backoff = new DecorrelatedJitterBackoff({
      minIntervalMs: this.config.minBackoffMs,
      maxIntervalMs: this.config.maxBackoffMs,
      random: this.config.random,
    });
    this.tracer = new RequestTracer(this.config.generateId);
    this.clock = this.config.clock ?? Date.now;
    this.sleep = this.config.sleep ?? sleep;
  }

  static builder(): RestRequestExecutorBuilder {
    return new RestRequestExecutorBuilder();
  }

  /**
   * Send `request` with retries and return the final response.
   *
   * The response may carry a non-success status: terminal codes are returned
   * as-is, and a retryable one is returned when retrying stops on cancellation
   * or an exhausted retry timeout. `null` means retrying stopped before any
   * attempt produced a response.
   *
   * @throws {RestRequestError} INVALID_STATE when the transport can no longer send,
   *   NETWORK_ERROR when the retry timeout ran out and no attempt ever got a response.
   */
  async execute<T extends StatusLine>(
    transport: HttpTransport<T>,
    request: HttpRequest,
    options?: ExecuteOptions,
  ): Promise<T | null> {
    const result = await this.executeDetailed(transport, request, options);
    return result.response;
  }

  /** Like {@link execute}, with attempt count, timing and the reason retrying stopped. */
  async executeDetailed<T extends StatusLine>(
    transport: HttpTransport<T>,
    request: HttpRequest,
    options?: ExecuteOptions,
  ): Promise<ExecutionResult<T>> {
    return this.run(transport, request, options ?? {});
  }

  /** Like {@link executeDetailed}, but executor failures come back as `{ ok: false }` instead of throwing. */
  async tryExecute<T extends StatusLine>(
    transport: HttpTransport<T>,
    request: HttpRequest,
    options?: ExecuteOptions,
  ): Promise<Result<ExecutionResult<T>, RestRequestError>> {
    try {
      return { ok: true, value: await this.run(transport, request, options ?? {}) };
    } catch (err) {
      if (err instanceof RestRequestError) return { ok: false, error: err };
      throw err;
    }
  }

  private async run<T extends StatusLine>(
    transport: HttpTransport<T>,
    request: HttpRequest,
    options: ExecuteOptions,
  ): Promise<ExecutionResult<T>> {
    const startTime = this.clock();
    const retryTimeoutMs = Math.max(0, (options.retryTimeoutSeconds ?? 0) * 1000);
    const injectSocketTimeoutMs = options.injectSocketTimeoutMs ?? 0;

    let transientElapsedMs = 0;
    let backoffMs = this.backoff.initialInterval;
    let retryCount = 0;
    let lastError: Error | undefined;
    let lastResponse: T | null = null;
    let finalResponse: T | null = null;
    let stopReason: StopReason = "completed";

    for (;;) {
      this.logger.debug("Retry count", { retryCount });

      const attemptStart = this.clock();
      const injecting = injectSocketTimeoutMs !== 0 && retryCount === 0;
      const originalSocketTimeout = request.config.socketTimeoutMs;
      let response: T | null = null;

      try {
        if (options.withoutCookies) {
          request.config.cookiePolicy = CookiePolicy.IGNORE;
        }
        if (injecting) {
          this.logger.info("Injecting socket timeout", { socketTimeoutMs: injectSocketTimeoutMs });
          request.config.socketTimeoutMs = injectSocketTimeoutMs;
        }

        const requestGuid = this.tracer.stamp(request, {
          retryCount,
          clientStartTime: startTime,
          includeRetryParameters: options.includeRetryParameters ?? false,
          includeRequestGuid: options.includeRequestGuid ?? false,
        });
        this.events.emit(RequestEvent.ATTEMPT, { request: describeRequest(request), retryCount, requestGuid });

        response = await transport.send(request);
      } catch (err) {
        const error = toError(err);
        const classification = classifyFault(error);

        // e.g. the transport was closed underneath us; retrying cannot help
        if (!classification.retryable) {
          throw new RestRequestError(RestRequestErrorCode.INVALID_STATE, error.message, {
            cause: error,
            context: { retryCount, request: describeRequest(request) },
          });
        }

        lastError = error;

        const attemptMs = this.clock() - attemptStart;
        if (attemptMs > this.config.longAttemptThresholdMs) {
          this.logger.error("HTTP request took longer than the long-attempt threshold", {
            elapsedSeconds: Math.floor(attemptMs / 1000),
            request: describeRequest(request),
          });
          this.events.emit(RequestEvent.LONG_ATTEMPT, { request: describeRequest(request), elapsedMs: attemptMs });
        }

        this.logger.warn("Exception encountered for request", {
          request: describeRequest(request),
          errorType: classification.errorType,
          error: error.message,
        });
      } finally {
        if (injecting) {
          request.config.socketTimeoutMs = originalSocketTimeout;
        }
      }

      if (response !== null) {
        lastResponse = response;
        const classification = classifyStatus(response.status, this.config.retryableStatusCodes);

        if (!classification.retryable) {
          this.logger.debug("HTTP response code", { status: response.status });
          if (response.status !== SUCCESS_STATUS) {
            this.logger.debug("Error response not retryable", {
              status: response.status,
              request: describeRequest(request),
            });
            this.events.emit(RequestEvent.NETWORK_ERROR, {
              statusCode: response.status,
              reason: response.statusText,
              request: describeRequest(request),
            });
          }
          finalResponse = response;
          break;
        }

        this.logger.warn("HTTP response not ok", {
          status: response.status,
          reason: classification.reason,
          request: describeRequest(request),
        });
      } else {
        this.logger.warn("Null response for request", { request: describeRequest(request) });
      }

      const elapsedForAttempt = this.clock() - attemptStart;

      if (options.signal?.aborted) {
        this.logger.info("Stop retrying since cancellation was requested", { retryCount });
        this.events.emit(RequestEvent.CANCELLED, { request: describeRequest(request), retryCount });
        finalResponse = response;
        stopReason = "cancelled";
        break;
      }

      if (retryTimeoutMs > 0) {
        transientElapsedMs += elapsedForAttempt;

        if (transientElapsedMs > retryTimeoutMs && retryCount >= this.config.minRetryCount) {
          this.logger.error("Stop retrying since elapsed time due to network issues has reached timeout", {
            elapsedMs: transientElapsedMs,
            timeoutMs: retryTimeoutMs,
          });
          this.events.emit(RequestEvent.RETRY_TIMEOUT, {
            request: describeRequest(request),
            transientElapsedMs,
            retryTimeoutMs,
          });

          if (lastResponse === null && lastError) {
            throw new RestRequestError(
              RestRequestErrorCode.NETWORK_ERROR,
              `Exception encountered for HTTP request: ${lastError.message}`,
              { cause: lastError, context: { retryCount, transientElapsedMs, retryTimeoutMs } },
            );
          }

          finalResponse = lastResponse;
          stopReason = "retry-timeout";
          break;
        }
      }

      this.logger.debug("Retrying request", { request: describeRequest(request) });

      // An attempt that already outlasted the backoff has absorbed the wait
      const shouldSleep = backoffMs > elapsedForAttempt;
      this.events.emit(RequestEvent.RETRYING, {
        request: describeRequest(request),
        retryCount,
        status: response?.status ?? null,
        error: response === null ? lastError : undefined,
        backoffMs,
        slept: shouldSleep,
      });

      if (shouldSleep) {
        try {
          this.logger.debug("Sleeping before retry", { backoffMs });
          await this.sleep(backoffMs);
          transientElapsedMs += backoffMs;
          backoffMs = this.backoff.nextSleepTime(backoffMs);
        } catch (err) {
          this.logger.debug("Backoff sleep before retrying got interrupted", { error: toError(err).message });
        }
      }

      if (response !== null) {
        await transport.release(response);
      }

      retryCount++;
    }

    if (finalResponse === null) {
      this.logger.error("Returning null response for request", { request: describeRequest(request) });
    } else if (finalResponse.status !== SUCCESS_STATUS) {
      this.logger.error("Error response", { status: finalResponse.status, request: describeRequest(request) });
    }

    this.events.emit(RequestEvent.COMPLETED, {
      request: describeRequest(request),
      status: finalResponse?.status ?? null,
      attempts: retryCount + 1,
      stopReason,
    });

    return {
      response: finalResponse,
      stopReason,
      attempts: retryCount + 1,
      retryCount,
      totalLatencyMs: this.clock() - startTime,
      transientElapsedMs,
    };
  }
}
