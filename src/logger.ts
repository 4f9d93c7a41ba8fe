import type { Logger } from "./types.js";

/** Create a console-based logger with `[rest-retry-kit]` prefix. Pass your own Logger to override. */
export function createDefaultLogger(): Logger {
  return {
    debug(msg, data) {
      console.debug(`[rest-retry-kit] ${msg}`, data ?? "");
    },
    info(msg, data) {
      console.info(`[rest-retry-kit] ${msg}`, data ?? "");
    },
    warn(msg, data) {
      console.warn(`[rest-retry-kit] ${msg}`, data ?? "");
    },
    error(msg, data) {
      console.error(`[rest-retry-kit] ${msg}`, data ?? "");
    },
  };
}
