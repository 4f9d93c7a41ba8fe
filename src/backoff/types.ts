export interface BackoffConfig {
  /** Lower bound of every interval, and the first interval used (default: 1000) */
  minIntervalMs: number;
  /** Upper bound of every interval (default: 16000) */
  maxIntervalMs: number;
  /** Uniform source in [0, 1). Inject a seeded one for reproducible sequences. */
  random?: () => number;
}
