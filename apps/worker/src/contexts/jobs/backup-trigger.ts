import type { EventSink } from "../events/event-sink.js";
import type { ScheduledJob } from "./types.js";

export const BACKUP_TRIGGER_ID = "backup-trigger";

export interface BackupTriggerDeps {
	events: EventSink;
	timezone: string;
}

/** Daily request for a database backup. The dump itself happens elsewhere. */
export function createBackupTrigger(deps: BackupTriggerDeps): ScheduledJob {
	return {
		descriptor: {
			id: BACKUP_TRIGGER_ID,
			description: "Request a database backup",
		},
		trigger: { kind: "cron", expression: "0 3 * * *", timezone: deps.timezone },
		callback: async (context) => {
			await deps.events.emit({
				type: "backup_requested",
				occurredAt: context.firedAt.toISOString(),
				runId: context.runId,
			});
			return { processed: 1, failed: 0 };
		},
	};
}
