import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "dotenv";
import type { Logger } from "../../src/index.js";

export const PLAYGROUND_ROOT = resolve(fileURLToPath(new URL(".", import.meta.url)), "..");

config({ path: resolve(PLAYGROUND_ROOT, ".env") });

// ── Colors ──────────────────────────────────────────────────────────
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const MAGENTA = "\x1b[35m";
const BLUE = "\x1b[34m";

export const c = {
  ok: (s: string) => `${GREEN}${s}${RESET}`,
  fail: (s: string) => `${RED}${s}${RESET}`,
  warn: (s: string) => `${YELLOW}${s}${RESET}`,
  info: (s: string) => `${CYAN}${s}${RESET}`,
  accent: (s: string) => `${MAGENTA}${s}${RESET}`,
  dim: (s: string) => `${DIM}${s}${RESET}`,
  bold: (s: string) => `${BOLD}${s}${RESET}`,
  blue: (s: string) => `${BLUE}${s}${RESET}`,
};

// ── Section header ──────────────────────────────────────────────────
export function section(title: string) {
  const line = "─".repeat(60);
  console.log(`\n${c.blue(line)}`);
  console.log(`  ${c.bold(title)}`);
  console.log(`${c.blue(line)}\n`);
}

export function step(label: string) {
  console.log(`  ${c.accent("▸")} ${label}`);
}

export function pass(label: string) {
  console.log(`  ${c.ok("✓")} ${label}`);
}

export function fail(label: string, err?: unknown) {
  console.log(`  ${c.fail("✗")} ${label}`);
  if (err) console.log(`    ${c.dim(String(err))}`);
}

// ── Env ─────────────────────────────────────────────────────────────
export function getTargetUrl(): string | undefined {
  return process.env.TARGET_URL;
}

export function getRetryTimeoutSeconds(): number {
  const raw = Number(process.env.RETRY_TIMEOUT_SECONDS ?? "30");
  return Number.isFinite(raw) ? raw : 30;
}

// ── Flaky server ────────────────────────────────────────────────────
export interface FlakyServer {
  url: string;
  /** Requests seen per path, including query string */
  hits: Map<string, string[]>;
  close(): Promise<void>;
}

type Handler = (req: IncomingMessage, res: ServerResponse, hit: number) => void;

/** Local HTTP server whose routes misbehave for a scripted number of hits */
export async function startFlakyServer(routes: Record<string, Handler>): Promise<FlakyServer> {
  const hits = new Map<string, string[]>();

  const server: Server = createServer((req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const seen = hits.get(url.pathname) ?? [];
    seen.push(url.search);
    hits.set(url.pathname, seen);

    const handler = routes[url.pathname];
    if (!handler) {
      res.writeHead(404).end();
      return;
    }
    handler(req, res, seen.length);
  });

  await new Promise<void>((resolveListen) => server.listen(0, "127.0.0.1", resolveListen));
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error(`Unexpected server address: ${String(address)}`);
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    hits,
    close: () =>
      new Promise<void>((resolveClose, rejectClose) => {
        server.closeAllConnections();
        server.close((err) => (err ? rejectClose(err) : resolveClose()));
      }),
  };
}

// ── Pretty logger ───────────────────────────────────────────────────
export const prettyLogger: Logger = {
  debug(msg, data) {
    console.log(`    ${c.dim("[debug]")} ${msg}`, data ? c.dim(JSON.stringify(data)) : "");
  },
  info(msg, data) {
    console.log(`    ${c.info("[info]")}  ${msg}`, data ? c.dim(JSON.stringify(data)) : "");
  },
  warn(msg, data) {
    console.log(`    ${c.warn("[warn]")}  ${msg}`, data ? c.dim(JSON.stringify(data)) : "");
  },
  error(msg, data) {
    console.log(`    ${c.fail("[error]")} ${msg}`, data ? c.dim(JSON.stringify(data)) : "");
  },
};

// ── Timer ───────────────────────────────────────────────────────────
export function timer(): () => number {
  const start = performance.now();
  return () => Math.round(performance.now() - start);
}

// ── Run wrapper ─────────────────────────────────────────────────────
export async function runTest(name: string, fn: () => Promise<void>): Promise<boolean> {
  section(name);
  try {
    await fn();
    console.log(`\n  ${c.ok("PASSED")}\n`);
    return true;
  } catch (err) {
    fail("Test failed", err);
    if (err instanceof Error && err.stack) {
      console.log(`    ${c.dim(err.stack.split("\n").slice(1, 4).join("\n    "))}`);
    }
    console.log(`\n  ${c.fail("FAILED")}\n`);
    return false;
  }
}
