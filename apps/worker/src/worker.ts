import { Worker } from "bullmq";
import { QUEUE_NAME, redisConnectionOptions, type JobName } from "./queues.js";
import { dailyOperationsJobDataSchema, type DailyOperationsJobData } from "./types.js";
import { recordSystemTaskRun } from "./lib/systemTaskRun.js";
import type { OpsRuntime } from "./lib/runtime.js";
import { systemTasks } from "./systemTasks.js";

export function startWorker(runtime: OpsRuntime) {
  const connection = redisConnectionOptions();
  const tasks = systemTasks(runtime.config);

  const worker = new Worker<DailyOperationsJobData, unknown, JobName>(
    QUEUE_NAME,
    async (job) => {
      switch (job.name) {
        case "DAILY_OPERATIONS": {
          const { source } = dailyOperationsJobDataSchema.parse(job.data ?? {});
          return recordSystemTaskRun({
            db: runtime.db,
            def: tasks.DAILY_OPERATIONS,
            run: () => runtime.trigger.fire(source),
            statusOf: (r) => (r.status === "completed" ? "SUCCESS" : "SKIPPED")
          });
        }
        default:
          throw new Error(`Unknown job: ${job.name}`);
      }
    },
    {
      connection,
      // The daily pipeline is strictly serial.
      concurrency: 1
    }
  );

  worker.on("failed", (job, err) => {
    console.error("job failed", { id: job?.id, name: job?.name, err: err?.message });
  });

  worker.on("completed", (job) => {
    console.log("job completed", { id: job.id, name: job.name });
  });

  return worker;
}
