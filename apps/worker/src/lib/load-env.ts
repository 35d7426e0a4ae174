import { existsSync } from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

// The worker and its CLIs run outside any framework, so local env files are loaded explicitly.
// `.env.local` (developer machine) wins over `.env`; variables already set in the process are kept.
export function loadEnv(cwd = process.cwd()) {
  const candidates = [path.join(cwd, ".env.local"), path.join(cwd, ".env")];

  for (const p of candidates) {
    if (existsSync(p)) dotenv.config({ path: p, override: false });
  }
}
