import { vi } from "vitest";
import type { Logger } from "../../src/types.js";

export const TEST_URL = "https://example.test/api/query";
export const TEST_START_TIME = 1_700_000_000_000;

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** mulberry32: small deterministic PRNG so backoff sequences can be replayed */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  };
}

/** Simulated wall clock; sleeping advances it instantly */
export class FakeClock {
  readonly sleeps: number[] = [];

  constructor(private time = TEST_START_TIME) {}

  readonly now = (): number => this.time;

  readonly sleep = async (ms: number): Promise<void> => {
    this.sleeps.push(ms);
    this.time += ms;
  };

  advance(ms: number): void {
    this.time += ms;
  }
}

export function networkError(code: string, message = "socket hang up"): Error {
  const err = new Error(message);
  (err as NodeJS.ErrnoException).code = code;
  return err;
}
