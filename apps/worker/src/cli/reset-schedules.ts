import { loadEnv } from "../lib/load-env.js";
import { opsConfig } from "../lib/config.js";
import { workerQueue, type WorkerQueue } from "../queues.js";
import { ensureSchedules } from "../scheduler.js";

/**
 * Reset the BullMQ repeatable schedule for this worker.
 *
 * By default:
 * - removes all repeatable jobs for the queue
 * - re-adds the daily schedule at the configured fire time and time zone
 *
 * Usage:
 *   tsx src/cli/reset-schedules.ts
 *   tsx src/cli/reset-schedules.ts --run-now
 *   tsx src/cli/reset-schedules.ts --purge-queue
 */

function hasFlag(flag: string) {
  return process.argv.includes(flag);
}

const CLEAN_BATCH = 1000;
const MAX_CLEAN_ROUNDS = 20;

async function removeFinished(queue: WorkerQueue, state: "completed" | "failed"): Promise<number> {
  let removed = 0;
  for (let round = 0; round < MAX_CLEAN_ROUNDS; round++) {
    const ids = await queue.clean(0, CLEAN_BATCH, state);
    if (ids.length === 0) break;
    removed += ids.length;
  }
  return removed;
}

// Pending work goes first so nothing starts while finished jobs are removed.
async function purgeQueue(queue: WorkerQueue): Promise<{ completed: number; failed: number }> {
  await queue.drain(true);
  return {
    completed: await removeFinished(queue, "completed"),
    failed: await removeFinished(queue, "failed")
  };
}

async function main() {
  loadEnv();
  const config = opsConfig();
  const queue = workerQueue();

  const purged = hasFlag("--purge-queue") ? await purgeQueue(queue) : null;

  const repeatables = await queue.getRepeatableJobs();
  for (const r of repeatables) {
    await queue.removeRepeatableByKey(r.key);
  }

  await ensureSchedules(queue, config);

  const runNow = hasFlag("--run-now");
  if (runNow) {
    await queue.add(
      "DAILY_OPERATIONS",
      { source: "manual" },
      { jobId: `manual-daily-operations-${Date.now()}`, removeOnComplete: 50, removeOnFail: 200 }
    );
  }

  await queue.close();
  console.log(
    JSON.stringify(
      {
        purgedQueue: purged !== null,
        removedFinishedJobs: purged,
        removedRepeatables: repeatables.length,
        readded: true,
        ranNow: runNow
      },
      null,
      2
    )
  );
}

main().catch((e) => {
  console.error("reset-schedules failed", e);
  process.exit(1);
});
