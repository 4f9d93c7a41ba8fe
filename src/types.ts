export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
}

/** Minimal view of an HTTP response the executor needs for classification */
export interface StatusLine {
  readonly status: number;
  readonly statusText: string;
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };
