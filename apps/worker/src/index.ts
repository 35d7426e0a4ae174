import { loadEnv } from "./lib/load-env.js";
import { opsConfig, formatFireTime } from "./lib/config.js";
import { errorMessage } from "./lib/errors.js";
import { createOpsRuntime, type OpsRuntime } from "./lib/runtime.js";
import { startWorker } from "./worker.js";
import { workerQueue } from "./queues.js";
import { ensureSchedules } from "./scheduler.js";

// One process: BullMQ worker for the daily pipeline, the repeatable schedule,
// and catch-up checks on startup and SIGCONT.

function catchUp(runtime: OpsRuntime, source: "startup" | "resume") {
  runtime.trigger
    .catchUp(source)
    .then((r) => console.log("[daily] catch-up checked", { source, status: r.status }))
    .catch((e) => console.error("[daily] catch-up failed", { source, error: errorMessage(e) }));
}

async function main() {
  loadEnv();
  const config = opsConfig();
  const runtime = await createOpsRuntime(config);

  const worker = startWorker(runtime);
  const queue = workerQueue();
  // Register cron-style repeatable jobs.
  ensureSchedules(queue, config).catch((e) => console.error("scheduler failed", e));

  catchUp(runtime, "startup");
  process.on("SIGCONT", () => catchUp(runtime, "resume"));

  const shutdown = async () => {
    await worker.close();
    await queue.close();
    await runtime.close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown()
        .then(() => process.exit(0))
        .catch((e) => {
          console.error("shutdown failed", e);
          process.exit(1);
        });
    });
  }

  console.log("worker started", { timezone: config.timezone, fireTime: formatFireTime(config.fireTime) });
}

main().catch((e) => {
  console.error("worker failed to start", e);
  process.exit(1);
});
