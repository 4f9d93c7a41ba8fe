export { DecorrelatedJitterBackoff } from "./decorrelated-jitter.js";
export type { BackoffConfig } from "./types.js";
