/**
 * Test 01 — RestRequestExecutor against a local flaky server
 *
 * No network access needed: the server runs in this process.
 */
import {
  createRequest,
  FetchTransport,
  RequestEvent,
  RestRequestError,
  RestRequestExecutor,
} from "../../src/index.js";
import { c, pass, prettyLogger, runTest, startFlakyServer, step, timer } from "./utils.js";

async function test() {
  const server = await startFlakyServer({
    // 503 twice, then 200
    "/busy": (_req, res, hit) => res.writeHead(hit <= 2 ? 503 : 200).end(hit <= 2 ? "busy" : "ok"),
    "/missing": (_req, res) => res.writeHead(404).end(),
    // hangs on the first hit so the injected socket timeout fires
    "/slow": (_req, res, hit) => {
      if (hit === 1) setTimeout(() => res.writeHead(200).end(), 500);
      else res.writeHead(200).end();
    },
  });

  const transport = new FetchTransport();
  const executor = RestRequestExecutor.builder().backoff(50, 400).withLogger(prettyLogger).build();

  try {
    // ── 1. Retry through 503s ───────────────────────────────────────
    step("Retries 503 until 200");
    {
      const retries: number[] = [];
      executor.events.on(RequestEvent.RETRYING, ({ backoffMs }) => retries.push(backoffMs));
      const t = timer();
      const result = await executor.executeDetailed(transport, createRequest(`${server.url}/busy`), {
        retryTimeoutSeconds: 10,
        includeRetryParameters: true,
        includeRequestGuid: true,
      });
      executor.events.removeAllListeners(RequestEvent.RETRYING);

      if (result.response?.status !== 200) throw new Error(`Expected 200, got ${result.response?.status}`);
      if (result.attempts !== 3) throw new Error(`Expected 3 attempts, got ${result.attempts}`);
      pass(`200 after ${result.attempts} attempts in ${c.info(`${t()}ms`)}, backoffs: [${retries.join(", ")}]`);
      pass(`Server saw: ${c.dim((server.hits.get("/busy") ?? []).join("  "))}`);
    }

    // ── 2. Terminal status returned as-is ───────────────────────────
    step("404 is returned without retrying");
    {
      const response = await executor.execute(transport, createRequest(`${server.url}/missing`));
      if (response?.status !== 404) throw new Error(`Expected 404, got ${response?.status}`);
      const hits = server.hits.get("/missing")?.length ?? 0;
      if (hits !== 1) throw new Error(`Expected 1 hit, got ${hits}`);
      pass("Single attempt, status 404");
    }

    // ── 3. Injected socket timeout on the first attempt ─────────────
    step("Injected socket timeout fails the first attempt only");
    {
      const result = await executor.executeDetailed(transport, createRequest(`${server.url}/slow`), {
        injectSocketTimeoutMs: 100,
      });
      if (result.response?.status !== 200) throw new Error(`Expected 200, got ${result.response?.status}`);
      pass(`Recovered after ${result.attempts} attempts`);
    }

    // ── 4. Closed transport ─────────────────────────────────────────
    step("Closed transport fails fast");
    {
      const closed = new FetchTransport();
      closed.close();
      try {
        await executor.execute(closed, createRequest(`${server.url}/busy`), { retryTimeoutSeconds: 10 });
        throw new Error("Should have thrown");
      } catch (err) {
        if (!(err instanceof RestRequestError)) throw err;
        pass(`Threw RestRequestError immediately, code=${c.info(err.code)}`);
      }
    }
  } finally {
    await server.close();
  }
}

export const run = () => runTest("01 — Flaky local server", test);

// Auto-run when executed directly
const isMain = process.argv[1]?.includes("01-flaky-server");
if (isMain) void run();
