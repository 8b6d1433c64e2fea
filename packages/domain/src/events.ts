/**
 * Outbound Event Schemas
 *
 * Structured events handed to the messaging collaborator, which renders
 * and delivers them. The core never formats user-facing text.
 */

import { z } from "zod";
import type { Report } from "./report.js";

const IsoTimestamp = z.string().datetime();

// ============================================
// Event Schemas
// ============================================

export const RecordReminderEventSchema = z.object({
	type: z.literal("record_reminder"),
	occurredAt: IsoTimestamp,
	userId: z.string().min(1),
	openRecords: z
		.array(
			z.object({
				recordId: z.number().int().positive(),
				workplaceId: z.number().int().positive(),
				startTime: IsoTimestamp,
			}),
		)
		.min(1),
});
export type RecordReminderEvent = z.infer<typeof RecordReminderEventSchema>;

export const ReportSummarySchema = z.object({
	windowStart: IsoTimestamp,
	windowEnd: IsoTimestamp,
	totalDurationMs: z.number().nonnegative(),
	totalEarnings: z.number().nonnegative(),
	closedRecords: z.number().int().nonnegative(),
	openRecords: z.number().int().nonnegative(),
	groups: z.array(
		z.object({
			workplaceId: z.number().int(),
			workplaceName: z.string().nullable(),
			durationMs: z.number().nonnegative(),
			earnings: z.number().nonnegative(),
			unknownWorkplace: z.boolean(),
		}),
	),
});
export type ReportSummary = z.infer<typeof ReportSummarySchema>;

export const ReportReadyEventSchema = z.object({
	type: z.literal("report_ready"),
	occurredAt: IsoTimestamp,
	userId: z.string().min(1),
	/** Zone the report window was resolved in */
	timezone: z.string().min(1),
	report: ReportSummarySchema,
});
export type ReportReadyEvent = z.infer<typeof ReportReadyEventSchema>;

export const BackupRequestedEventSchema = z.object({
	type: z.literal("backup_requested"),
	occurredAt: IsoTimestamp,
	runId: z.string().min(1),
});
export type BackupRequestedEvent = z.infer<typeof BackupRequestedEventSchema>;

export const JobFailedEventSchema = z.object({
	type: z.literal("job_failed"),
	occurredAt: IsoTimestamp,
	jobId: z.string().min(1),
	runId: z.string().min(1),
	error: z.string(),
});
export type JobFailedEvent = z.infer<typeof JobFailedEventSchema>;

export const OutboundEventSchema = z.discriminatedUnion("type", [
	RecordReminderEventSchema,
	ReportReadyEventSchema,
	BackupRequestedEventSchema,
	JobFailedEventSchema,
]);
export type OutboundEvent = z.infer<typeof OutboundEventSchema>;
export type OutboundEventType = OutboundEvent["type"];

// ============================================
// Helpers
// ============================================

export function summarizeReport(report: Report): ReportSummary {
	return {
		windowStart: report.window.start.toISOString(),
		windowEnd: report.window.end.toISOString(),
		totalDurationMs: report.totalDurationMs,
		totalEarnings: report.totalEarnings,
		closedRecords: report.closedRecords,
		openRecords: report.openRecords,
		groups: report.groups.map((group) => ({
			workplaceId: group.workplaceId,
			workplaceName: group.workplaceName,
			durationMs: group.durationMs,
			earnings: group.earnings,
			unknownWorkplace: group.unknownWorkplace,
		})),
	};
}
