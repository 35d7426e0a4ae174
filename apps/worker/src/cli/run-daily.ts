import { loadEnv } from "../lib/load-env.js";
import { opsConfig } from "../lib/config.js";
import { createOpsRuntime } from "../lib/runtime.js";
import { workerQueue } from "../queues.js";

/**
 * Run the daily pipeline now.
 *
 * Usage:
 *   tsx src/cli/run-daily.ts            enqueue a manual DAILY_OPERATIONS job
 *   tsx src/cli/run-daily.ts --inline   run it in this process (no Redis)
 */

async function enqueue() {
  const queue = workerQueue();
  const job = await queue.add(
    "DAILY_OPERATIONS",
    { source: "manual" },
    { jobId: `manual-daily-operations-${Date.now()}`, removeOnComplete: 50, removeOnFail: 200 }
  );
  await queue.close();
  console.log(JSON.stringify({ enqueued: true, jobId: job.id ?? null }, null, 2));
}

async function inline() {
  const runtime = await createOpsRuntime(opsConfig());
  try {
    const result = await runtime.trigger.fire("manual");
    console.log(JSON.stringify(result, null, 2));
  } finally {
    await runtime.close();
  }
}

async function main() {
  loadEnv();
  if (process.argv.includes("--inline")) await inline();
  else await enqueue();
}

main().catch((e) => {
  console.error("run-daily failed", e);
  process.exit(1);
});
