import { loadEnv } from "../lib/load-env.js";
import { opsConfig } from "../lib/config.js";
import { createOpsRuntime } from "../lib/runtime.js";

/**
 * Import the operational dataset now, if the stored schema version is behind,
 * then generate today's instances.
 *
 * Usage:
 *   tsx src/cli/migrate.ts
 */

async function main() {
  loadEnv();
  const runtime = await createOpsRuntime(opsConfig(), { generateAfterMigration: true });
  runtime.events.on("migrationProgress", (p) => console.log(`[${p.step}/${p.total}] ${p.description}`));
  try {
    const outcome = await runtime.migration.runMigrationIfNeeded();
    console.log(JSON.stringify(outcome, null, 2));
  } finally {
    await runtime.close();
  }
}

main().catch((e) => {
  console.error("migrate failed", e);
  process.exit(1);
});
