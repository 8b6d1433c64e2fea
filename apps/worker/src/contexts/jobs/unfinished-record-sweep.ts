/**
 * Unfinished Record Sweep
 *
 * At 20:00 local time, reminds each user about records that have been open
 * for longer than the staleness threshold.
 */

import type { TimeTrackingStore } from "@shiftlog/storage";
import { subHours } from "date-fns";
import type { EventSink } from "../events/event-sink.js";
import { QUARTER_HOUR_CRON, selectUsersInSlot } from "../scheduling/local-slot.js";
import { forEachUser, logInvalidZones, type ScheduledJob } from "./types.js";

export const UNFINISHED_RECORD_SWEEP_ID = "unfinished-record-sweep";

const REMINDER_SLOT = { hour: 20 };

export interface UnfinishedRecordSweepDeps {
	store: Pick<TimeTrackingStore, "users" | "records">;
	events: EventSink;
	staleRecordHours: number;
}

export function createUnfinishedRecordSweep(deps: UnfinishedRecordSweepDeps): ScheduledJob {
	return {
		descriptor: {
			id: UNFINISHED_RECORD_SWEEP_ID,
			description: "Remind users about records left open",
		},
		trigger: { kind: "cron", expression: QUARTER_HOUR_CRON, timezone: "UTC" },
		callback: async (context) => {
			const users = await deps.store.users.listAll();
			const { due, invalidZone } = selectUsersInSlot(users, context.firedAt, REMINDER_SLOT);
			logInvalidZones(context, invalidZone);

			const cutoff = subHours(context.firedAt, deps.staleRecordHours);

			return forEachUser(due, context, async (user) => {
				const open = await deps.store.records.listOpenStartedBefore(user.id, cutoff);
				if (open.length === 0) {
					return 0;
				}

				await deps.events.emit({
					type: "record_reminder",
					occurredAt: context.firedAt.toISOString(),
					userId: user.id,
					openRecords: open.map((record) => ({
						recordId: record.id,
						workplaceId: record.workplaceId,
						startTime: record.startTime.toISOString(),
					})),
				});
				context.log.debug({ userId: user.id, openRecords: open.length }, "Reminder emitted");
				return 1;
			});
		},
	};
}
