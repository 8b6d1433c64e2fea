/**
 * Jobs Bounded Context
 *
 * The recurring jobs the worker registers with its scheduler.
 */

import type { TimeTrackingStore } from "@shiftlog/storage";
import type { EventSink } from "../events/event-sink.js";
import type { ReportAggregator } from "../reporting/report-aggregator.js";
import type { TimezoneResolver } from "../timezone/timezone-resolver.js";
import { createBackupTrigger } from "./backup-trigger.js";
import { createRetentionCleanup } from "./retention-cleanup.js";
import { createTimezoneSync } from "./timezone-sync.js";
import type { ScheduledJob } from "./types.js";
import { createUnfinishedRecordSweep } from "./unfinished-record-sweep.js";
import { createWeeklyReport } from "./weekly-report.js";

export { BACKUP_TRIGGER_ID, createBackupTrigger } from "./backup-trigger.js";
export { createRetentionCleanup, RETENTION_CLEANUP_ID } from "./retention-cleanup.js";
export { createTimezoneSync, TIMEZONE_SYNC_ID } from "./timezone-sync.js";
export { forEachUser, type ScheduledJob } from "./types.js";
export { createUnfinishedRecordSweep, UNFINISHED_RECORD_SWEEP_ID } from "./unfinished-record-sweep.js";
export { createWeeklyReport, WEEKLY_REPORT_ID } from "./weekly-report.js";

export interface JobDeps {
	store: TimeTrackingStore;
	events: EventSink;
	aggregator: Pick<ReportAggregator, "aggregate">;
	resolver: Pick<TimezoneResolver, "resolveByName">;
	serviceTimezone: string;
	staleRecordHours: number;
	retentionDays: number;
}

export function createJobs(deps: JobDeps): ScheduledJob[] {
	return [
		createUnfinishedRecordSweep({ store: deps.store, events: deps.events, staleRecordHours: deps.staleRecordHours }),
		createWeeklyReport({ store: deps.store, aggregator: deps.aggregator, events: deps.events }),
		createRetentionCleanup({ store: deps.store, retentionDays: deps.retentionDays, timezone: deps.serviceTimezone }),
		createBackupTrigger({ events: deps.events, timezone: deps.serviceTimezone }),
		createTimezoneSync({ store: deps.store, resolver: deps.resolver, timezone: deps.serviceTimezone }),
	];
}
