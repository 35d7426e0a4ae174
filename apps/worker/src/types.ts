import { z } from "zod";

// Sources a queued job may carry; resume/startup never go through the queue.
export const dailyOperationsJobDataSchema = z.object({
  source: z.enum(["schedule", "manual"]).default("schedule")
});

export type DailyOperationsJobData = z.input<typeof dailyOperationsJobDataSchema>;
