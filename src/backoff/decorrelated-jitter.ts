import { DEFAULT_BACKOFF_CONFIG } from "../constants.js";
import { RestRequestError, RestRequestErrorCode } from "../errors.js";
import type { BackoffConfig } from "./types.js";

/**
 * Decorrelated-jitter backoff.
 *   next = random(min, min(max, previous * 3))
 *
 * Anchoring each draw to the previous interval spreads concurrently failing
 * callers apart instead of having them retry in lockstep.
 */
export class DecorrelatedJitterBackoff {
  readonly minIntervalMs: number;
  readonly maxIntervalMs: number;
  private readonly random: () => number;

  constructor(config?: Partial<BackoffConfig>) {
    const resolved = { ...DEFAULT_BACKOFF_CONFIG, ...config };
    if (!(resolved.minIntervalMs > 0)) {
      throw new RestRequestError(
        RestRequestErrorCode.INVALID_CONFIG,
        `minIntervalMs must be positive, got ${resolved.minIntervalMs}`,
      );
    }
    if (resolved.maxIntervalMs < resolved.minIntervalMs) {
      throw new RestRequestError(
        RestRequestErrorCode.INVALID_CONFIG,
        `maxIntervalMs (${resolved.maxIntervalMs}) must not be below minIntervalMs (${resolved.minIntervalMs})`,
      );
    }
    this.minIntervalMs = resolved.minIntervalMs;
    this.maxIntervalMs = resolved.maxIntervalMs;
    this.random = config?.random ?? Math.random;
  }

  get initialInterval(): number {
    return this.minIntervalMs;
  }

  nextSleepTime(previousMs: number): number {
    const upper = Math.max(this.minIntervalMs, Math.min(this.maxIntervalMs, previousMs * 3));
    return Math.floor(this.minIntervalMs + this.random() * (upper - this.minIntervalMs));
  }

  /** First `count` intervals of a fresh sequence, starting at the minimum */
  intervals(count: number): number[] {
    const result: number[] = [];
    let current = this.initialInterval;
    for (let i = 0; i < count; i++) {
      result.push(current);
      current = this.nextSleepTime(current);
    }
    return result;
  }
}
