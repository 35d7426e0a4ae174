import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/src/**/*.test.ts"],
    environment: "node",
    // sqlite3 is a native add-on; keep it out of worker threads.
    pool: "forks"
  }
});
