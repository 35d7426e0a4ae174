import { Queue, type ConnectionOptions } from "bullmq";
import { requiredEnv } from "./lib/env.js";
import type { DailyOperationsJobData } from "./types.js";

export type JobName = "DAILY_OPERATIONS";

export const QUEUE_NAME = "facilityops-worker";

const DEFAULT_REDIS_PORT = 6379;

/** Maps a `redis://` or `rediss://` URL onto BullMQ connection options. */
export function parseRedisUrl(raw: string): ConnectionOptions {
  const url = new URL(raw);
  const secure = url.protocol === "rediss:";
  if (!secure && url.protocol !== "redis:") {
    throw new Error(`Unsupported REDIS_URL scheme "${url.protocol}" (expected redis: or rediss:)`);
  }

  const dbIndex = url.pathname.replace(/^\//, "");
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : DEFAULT_REDIS_PORT,
    db: dbIndex ? Number(dbIndex) : 0,
    // BullMQ workers block on Redis and refuse a retry limit.
    maxRetriesPerRequest: null,
    ...(url.username ? { username: decodeURIComponent(url.username) } : {}),
    ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
    ...(secure ? { tls: { servername: url.hostname } } : {})
  };
}

export function redisConnectionOptions(): ConnectionOptions {
  return parseRedisUrl(requiredEnv("REDIS_URL"));
}

export type WorkerQueue = Queue<DailyOperationsJobData, unknown, JobName>;

export function workerQueue(): WorkerQueue {
  const connection = redisConnectionOptions();
  return new Queue<DailyOperationsJobData, unknown, JobName>(QUEUE_NAME, { connection });
}
