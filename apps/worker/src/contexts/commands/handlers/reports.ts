import { DateStringSchema, efficiencyMetrics, parseInput } from "@shiftlog/domain";
import { z } from "zod";
import { ReportPeriodSchema, resolvePeriodWindow, trailingDaysWindow } from "../../reporting/periods.js";
import type { ReportAggregator } from "../../reporting/report-aggregator.js";
import type { CommandHandler, HandlerContext } from "../pipeline.js";

const ReportArgsSchema = z.object({
	period: ReportPeriodSchema.default("today"),
	start: DateStringSchema.optional(),
	end: DateStringSchema.optional(),
});

const StatsArgsSchema = z.object({
	days: z.coerce.number().int().min(1).max(365).default(30),
});

function periodWindow({ user, args, now }: HandlerContext, subject: string) {
	const { period, start, end } = parseInput(ReportArgsSchema, args, subject);
	const custom = start && end ? { start, end } : undefined;
	return { period, window: resolvePeriodWindow(period, user.timezone, now, custom) };
}

/** On-demand report over a period resolved in the user's zone */
export function createReportsHandler(aggregator: Pick<ReportAggregator, "aggregate">): CommandHandler {
	return async (context) => {
		const { user, now } = context;
		const { period, window } = periodWindow(context, "report request");

		const report = await aggregator.aggregate(user.id, window.start, window.end, now);
		return { kind: "report", period, timezone: user.timezone, report };
	};
}

/** Structured per-record rows; turning them into a file is the integration's job */
export function createExportHandler(aggregator: Pick<ReportAggregator, "exportRecords">): CommandHandler {
	return async (context) => {
		const { user, now } = context;
		const { period, window } = periodWindow(context, "export request");

		const rows = await aggregator.exportRecords(user.id, window.start, window.end, now);
		return { kind: "export", period, timezone: user.timezone, window, rows };
	};
}

/** Daily averages over the last `days` local days */
export function createStatsHandler(aggregator: Pick<ReportAggregator, "aggregate">): CommandHandler {
	return async ({ user, args, now }) => {
		const { days } = parseInput(StatsArgsSchema, args, "stats request");
		const window = trailingDaysWindow(days, user.timezone, now);

		const report = await aggregator.aggregate(user.id, window.start, window.end, now);
		return { kind: "stats", timezone: user.timezone, window, metrics: efficiencyMetrics(report, days) };
	};
}
