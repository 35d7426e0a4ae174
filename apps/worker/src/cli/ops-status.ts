import { loadEnv } from "../lib/load-env.js";
import { opsConfig, formatFireTime } from "../lib/config.js";
import { createOpsRuntime } from "../lib/runtime.js";
import { recentSystemTaskRuns } from "../lib/systemTaskRun.js";

async function main() {
  loadEnv();
  const config = opsConfig();
  const runtime = await createOpsRuntime(config);
  try {
    const { state } = runtime;
    const status = {
      timezone: config.timezone,
      fireTime: formatFireTime(config.fireTime),
      today: runtime.trigger.today(),
      schemaVersion: await state.schemaVersion(),
      targetVersion: config.schemaTargetVersion,
      lastDailyRunDate: await state.lastDailyRunDate(),
      lastBackup: await state.lastBackup(),
      migrationLog: await state.migrationLog(),
      recentRuns: await recentSystemTaskRuns(runtime.db, 5)
    };
    console.log(JSON.stringify(status, null, 2));
  } finally {
    await runtime.close();
  }
}

main().catch((e) => {
  console.error("ops-status failed", e);
  process.exit(1);
});
