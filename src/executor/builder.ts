import type { TypedEventEmitter } from "../events.js";
import type { Logger } from "../types.js";
import { RestRequestExecutor } from "./rest-request-executor.js";
import type { ExecutorConfig } from "./types.js";

/**
 * Fluent builder for constructing a RestRequestExecutor.
 *
 * Usage:
 *   const executor = RestRequestExecutor.builder()
 *     .backoff(250, 4_000)
 *     .retryableStatusCodes([408])
 *     .withLogger(logger)
 *     .build();
 */
export class RestRequestExecutorBuilder {
  private config: Partial<ExecutorConfig> = {};

  /** Bounds of the decorrelated-jitter backoff interval */
  backoff(minMs: number, maxMs: number): this {
    this.config.minBackoffMs = minMs;
    this.config.maxBackoffMs = maxMs;
    return this;
  }

  /** Retries made even after the retry timeout is exceeded */
  minRetryCount(count: number): this {
    this.config.minRetryCount = count;
    return this;
  }

  /** Replace the non-5xx codes treated as transient. Pass [408] to stop retrying on 403. */
  retryableStatusCodes(codes: readonly number[]): this {
    this.config.retryableStatusCodes = [...codes];
    return this;
  }

  longAttemptThreshold(ms: number): this {
    this.config.longAttemptThresholdMs = ms;
    return this;
  }

  withLogger(logger: Logger): this {
    this.config.logger = logger;
    return this;
  }

  withEvents(events: TypedEventEmitter): this {
    this.config.events = events;
    return this;
  }

  /** Replace wall clock and sleep, e.g. with a simulated clock in tests */
  withClock(clock: () => number, sleep?: (ms: number) => Promise<void>): this {
    this.config.clock = clock;
    if (sleep) this.config.sleep = sleep;
    return this;
  }

  withRandom(random: () => number): this {
    this.config.random = random;
    return this;
  }

  withIdGenerator(generateId: () => string): this {
    this.config.generateId = generateId;
    return this;
  }

  build(): RestRequestExecutor {
    if (this.config.minRetryCount !== undefined && this.config.minRetryCount < 0) {
      throw new Error("RestRequestExecutorBuilder: minRetryCount must not be negative");
    }
    return new RestRequestExecutor(this.config);
  }
}
