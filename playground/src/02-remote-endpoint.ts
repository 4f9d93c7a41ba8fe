/**
 * Test 02 — RestRequestExecutor against TARGET_URL from .env
 *
 * Reports whatever the endpoint answers; only a thrown RestRequestError fails the test.
 */
import { createRequest, FetchTransport, RestRequestExecutor } from "../../src/index.js";
import { c, getRetryTimeoutSeconds, getTargetUrl, pass, prettyLogger, runTest, step, timer } from "./utils.js";

async function test() {
  const url = getTargetUrl();
  if (!url) throw new Error("TARGET_URL not set in .env — see .env.example");

  const executor = RestRequestExecutor.builder().withLogger(prettyLogger).build();
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  step(`GET ${url}`);
  try {
    const t = timer();
    const result = await executor.executeDetailed(new FetchTransport(), createRequest(url), {
      retryTimeoutSeconds: getRetryTimeoutSeconds(),
      signal: controller.signal,
      includeRequestGuid: true,
    });
    pass(
      `status=${c.info(String(result.response?.status ?? "none"))} attempts=${result.attempts} ` +
        `stop=${result.stopReason} in ${c.info(`${t()}ms`)}`,
    );
  } finally {
    process.off("SIGINT", onSigint);
  }
}

export const run = () => runTest("02 — Remote endpoint", test);

const isMain = process.argv[1]?.includes("02-remote-endpoint");
if (isMain) void run();
