/**
 * Run all playground tests sequentially.
 *
 * Usage: npm run playground
 *
 * Test 01 runs fully in-process. Test 02 needs TARGET_URL (see .env.example).
 */
import { c, getTargetUrl, section } from "./utils.js";

const hasTarget = getTargetUrl() !== undefined;

interface TestEntry {
  name: string;
  needsTarget: boolean;
  load: () => Promise<{ run: () => Promise<boolean> }>;
}

const allTests: TestEntry[] = [
  { name: "01 — Flaky local server", needsTarget: false, load: () => import("./01-flaky-server.js") },
  { name: "02 — Remote endpoint", needsTarget: true, load: () => import("./02-remote-endpoint.js") },
];

async function main() {
  console.log("\n" + c.bold("  rest-retry-kit — Integration Playground"));
  console.log(c.dim("  ═══════════════════════════════════════\n"));

  if (!hasTarget) {
    console.log(c.warn("  No TARGET_URL set — test 02 will be skipped."));
    console.log(c.dim("  See .env.example for instructions.\n"));
  }

  const results: Array<{ name: string; status: "pass" | "fail" | "skip"; timeMs: number }> = [];

  for (const test of allTests) {
    if (test.needsTarget && !hasTarget) {
      console.log(`\n  ${c.warn("SKIP")}  ${test.name} ${c.dim("(no TARGET_URL)")}`);
      results.push({ name: test.name, status: "skip", timeMs: 0 });
      continue;
    }

    const start = performance.now();
    try {
      const mod = await test.load();
      const ok = await mod.run();
      results.push({
        name: test.name,
        status: ok ? "pass" : "fail",
        timeMs: Math.round(performance.now() - start),
      });
    } catch (err) {
      results.push({ name: test.name, status: "fail", timeMs: Math.round(performance.now() - start) });
      console.error(`\n  ${c.fail("FATAL:")} ${test.name}`, err);
    }
  }

  // ── Summary ───────────────────────────────────────────────────
  section("Summary");
  const passed = results.filter((r) => r.status === "pass").length;
  const failed = results.filter((r) => r.status === "fail").length;
  const skipped = results.filter((r) => r.status === "skip").length;
  const totalTime = results.reduce((sum, r) => sum + r.timeMs, 0);

  for (const r of results) {
    const icon =
      r.status === "pass" ? c.ok("PASS") : r.status === "fail" ? c.fail("FAIL") : c.warn("SKIP");
    console.log(`  ${icon}  ${r.name}  ${c.dim(`(${r.timeMs}ms)`)}`);
  }

  const parts = [`${c.bold(`${passed} passed`)}`];
  if (failed > 0) parts.push(c.fail(`${failed} failed`));
  if (skipped > 0) parts.push(c.warn(`${skipped} skipped`));
  console.log(`\n  ${parts.join(", ")} — ${c.dim(`${totalTime}ms total`)}\n`);

  if (failed > 0) process.exit(1);
}

void main();
