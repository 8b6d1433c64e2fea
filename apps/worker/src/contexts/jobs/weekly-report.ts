/**
 * Weekly Report
 *
 * Sunday 23:00 local time: aggregates the user's last seven days and hands
 * the summary to the event sink. Users without records in the window get
 * nothing.
 */

import { summarizeReport } from "@shiftlog/domain";
import type { TimeTrackingStore } from "@shiftlog/storage";
import { subDays } from "date-fns";
import type { EventSink } from "../events/event-sink.js";
import type { ReportAggregator } from "../reporting/report-aggregator.js";
import { QUARTER_HOUR_CRON, selectUsersInSlot } from "../scheduling/local-slot.js";
import { forEachUser, logInvalidZones, type ScheduledJob } from "./types.js";

export const WEEKLY_REPORT_ID = "weekly-report";

const WEEKLY_SLOT = { hour: 23, weekday: 0 };
const WINDOW_DAYS = 7;

export interface WeeklyReportDeps {
	store: Pick<TimeTrackingStore, "users">;
	aggregator: Pick<ReportAggregator, "aggregate">;
	events: EventSink;
}

export function createWeeklyReport(deps: WeeklyReportDeps): ScheduledJob {
	return {
		descriptor: {
			id: WEEKLY_REPORT_ID,
			description: "Send each user a summary of the past week",
		},
		trigger: { kind: "cron", expression: QUARTER_HOUR_CRON, timezone: "UTC" },
		callback: async (context) => {
			const users = await deps.store.users.listAll();
			const { due, invalidZone } = selectUsersInSlot(users, context.firedAt, WEEKLY_SLOT);
			logInvalidZones(context, invalidZone);

			const windowEnd = context.firedAt;
			const windowStart = subDays(windowEnd, WINDOW_DAYS);

			return forEachUser(due, context, async (user) => {
				const report = await deps.aggregator.aggregate(user.id, windowStart, windowEnd, windowEnd);
				if (report.closedRecords + report.openRecords === 0) {
					return 0;
				}

				await deps.events.emit({
					type: "report_ready",
					occurredAt: windowEnd.toISOString(),
					userId: user.id,
					timezone: user.timezone,
					report: summarizeReport(report),
				});
				return 1;
			});
		},
	};
}
