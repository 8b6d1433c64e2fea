/**
 * Retention Cleanup
 *
 * Monthly: deletes records older than the retention period, then
 * workplaces no record references.
 */

import type { TimeTrackingStore } from "@shiftlog/storage";
import { subDays } from "date-fns";
import type { ScheduledJob } from "./types.js";

export const RETENTION_CLEANUP_ID = "retention-cleanup";

export interface RetentionCleanupDeps {
	store: Pick<TimeTrackingStore, "records" | "workplaces">;
	retentionDays: number;
	/** Zone the monthly trigger is evaluated in */
	timezone: string;
}

export function createRetentionCleanup(deps: RetentionCleanupDeps): ScheduledJob {
	return {
		descriptor: {
			id: RETENTION_CLEANUP_ID,
			description: `Delete records older than ${deps.retentionDays} days`,
		},
		trigger: { kind: "cron", expression: "0 2 1 * *", timezone: deps.timezone },
		callback: async (context) => {
			const cutoff = subDays(context.firedAt, deps.retentionDays);

			const records = await deps.store.records.deleteStartedBefore(cutoff);
			context.signal.throwIfAborted();
			const workplaces = await deps.store.workplaces.deleteUnreferenced();

			context.log.info(
				{ cutoff: cutoff.toISOString(), deletedRecords: records, deletedWorkplaces: workplaces },
				"Retention cleanup complete",
			);
			return { processed: records + workplaces, failed: 0 };
		},
	};
}
