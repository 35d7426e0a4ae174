import { systemClock, type Calendar, type Clock, type DateKey } from "../lib/calendar.js";
import type { FireTime } from "../lib/config.js";
import type { StateStore } from "../lib/stateStore.js";
import { errorMessage } from "../lib/errors.js";

export type TriggerSource = "schedule" | "resume" | "startup" | "manual";

export type TriggerState = "idle" | "running" | "failed";

export type FireResult<R> =
  | { status: "busy"; source: TriggerSource }
  | { status: "already-ran"; source: TriggerSource; date: DateKey }
  | { status: "completed"; source: TriggerSource; date: DateKey; report: R };

export type CatchUpResult<R> = FireResult<R> | { status: "before-fire-time"; date: DateKey };

export type DailyTriggerDeps<R> = {
  state: StateStore;
  calendar: Calendar;
  fireTime: FireTime;
  pipeline: (date: DateKey) => Promise<R>;
  clock?: Clock;
};

/**
 * Runs the daily pipeline at most once per local calendar day. Every entry
 * point (cron job, process resume, manual run) goes through `fire`, which holds
 * a single in-progress guard.
 */
export class DailyTrigger<R> {
  private current: TriggerState = "idle";
  private readonly clock: Clock;
  private lastFailureMessage: string | null = null;

  constructor(private readonly deps: DailyTriggerDeps<R>) {
    this.clock = deps.clock ?? systemClock;
  }

  get state(): TriggerState {
    return this.current;
  }

  get lastFailure(): string | null {
    return this.lastFailureMessage;
  }

  today(): DateKey {
    return this.deps.calendar.dateKey(this.clock.now());
  }

  async fire(source: TriggerSource): Promise<FireResult<R>> {
    if (this.current !== "idle") {
      console.log("[daily] busy, ignoring trigger", { source });
      return { status: "busy", source };
    }
    // Claimed before the first await so a concurrent caller sees "running".
    this.current = "running";

    try {
      const date = this.today();
      const marker = await this.deps.state.lastDailyRunDate();
      if (marker === date) {
        return { status: "already-ran", source, date };
      }

      console.log("[daily] starting", { source, date });
      const report = await this.deps.pipeline(date);
      await this.deps.state.setLastDailyRunDate(date);
      this.lastFailureMessage = null;
      console.log("[daily] completed", { source, date });
      return { status: "completed", source, date, report };
    } catch (e) {
      this.current = "failed";
      this.lastFailureMessage = errorMessage(e);
      console.error("[daily] failed", { source, error: this.lastFailureMessage });
      throw e;
    } finally {
      this.current = "idle";
    }
  }

  /** Fires once the local fire time has passed today; a no-op before it. */
  async catchUp(source: "resume" | "startup" = "resume"): Promise<CatchUpResult<R>> {
    const now = this.clock.now();
    const fireMinute = this.deps.fireTime.hour * 60 + this.deps.fireTime.minute;
    if (this.deps.calendar.minuteOfDay(now) < fireMinute) {
      return { status: "before-fire-time", date: this.deps.calendar.dateKey(now) };
    }
    return this.fire(source);
  }
}
