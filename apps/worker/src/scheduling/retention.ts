import { days, systemClock, type Clock } from "../lib/calendar.js";
import { errorMessage } from "../lib/errors.js";
import type { OpsEvents } from "../lib/events.js";
import type { TaskStore } from "../lib/taskStore.js";

export const DEFAULT_RETENTION_DAYS = 90;

export type CleanupReport = {
  deletedInstances: number;
  deletedSessions: number;
  deletedOrphanedAttachments: number;
  failed: number;
};

type Deletion = {
  kind: "instance" | "session" | "attachment";
  ids: string[];
  remove: (id: string) => Promise<boolean>;
};

/**
 * Deletes completed task instances and closed work sessions older than the
 * horizon, plus attachments whose completion record is gone. Pending instances
 * and open sessions are never touched.
 */
export class RetentionSweeper {
  constructor(
    private readonly tasks: TaskStore,
    private readonly opts: { clock?: Clock; events?: OpsEvents } = {}
  ) {}

  async sweep(horizonDays: number = DEFAULT_RETENTION_DAYS): Promise<CleanupReport> {
    if (!Number.isFinite(horizonDays) || horizonDays < 0) {
      throw new Error(`Retention horizon must be a non-negative number of days (got ${horizonDays})`);
    }
    const now = (this.opts.clock ?? systemClock).now();
    const cutoff = new Date(now.getTime() - days(horizonDays)).toISOString();

    const deletions: Deletion[] = [
      {
        kind: "instance",
        ids: await this.tasks.expiredCompletedInstanceIds(cutoff),
        remove: (id) => this.tasks.deleteCompletedInstance(id, cutoff)
      },
      {
        kind: "session",
        ids: await this.tasks.expiredClosedSessionIds(cutoff),
        remove: (id) => this.tasks.deleteClosedSession(id, cutoff)
      },
      {
        kind: "attachment",
        ids: await this.tasks.orphanedAttachmentIds(),
        remove: (id) => this.tasks.deleteAttachment(id)
      }
    ];

    const deleted = { instance: 0, session: 0, attachment: 0 };
    let failed = 0;

    for (const d of deletions) {
      for (const id of d.ids) {
        try {
          if (await d.remove(id)) deleted[d.kind]++;
        } catch (e) {
          failed++;
          console.error("[retention] delete failed", { kind: d.kind, id, error: errorMessage(e) });
        }
      }
    }

    const report: CleanupReport = {
      deletedInstances: deleted.instance,
      deletedSessions: deleted.session,
      deletedOrphanedAttachments: deleted.attachment,
      failed
    };
    console.log("[retention] done", { cutoff, ...report });
    this.opts.events?.emit("cleanupCompleted", report);
    return report;
  }
}
