/**
 * Report Aggregation
 *
 * Pure per-workplace totals over a UTC window. Window boundaries arrive
 * already resolved to UTC; nothing here touches time zones or I/O.
 */

import type { TimeRecord, Workplace } from "./entities.js";
import { ValidationError } from "./errors.js";

const MS_PER_HOUR = 3_600_000;

// ============================================
// Types
// ============================================

/** Half-open interval `[start, end)` */
export interface ReportWindow {
	start: Date;
	end: Date;
}

export interface WorkplaceTotals {
	workplaceId: number;
	/** Null when the workplace is unknown */
	workplaceName: string | null;
	rate: number;
	durationMs: number;
	earnings: number;
	/** Closed records contributing to the sums */
	recordCount: number;
	openRecords: number;
	/** Records reference a workplace that no longer exists */
	unknownWorkplace: boolean;
}

export interface Report {
	window: ReportWindow;
	generatedAt: Date;
	groups: WorkplaceTotals[];
	totalDurationMs: number;
	totalEarnings: number;
	closedRecords: number;
	openRecords: number;
}

// ============================================
// Aggregation
// ============================================

export function assertWindow(window: ReportWindow): void {
	if (window.end.getTime() < window.start.getTime()) {
		throw new ValidationError("Report window ends before it starts", [
			{ path: "window.end", message: "Must not be before window.start" },
		]);
	}
}

/**
 * Aggregate `records` whose start falls in `window`.
 *
 * A record counts as closed when it has an end at or before `now`; any
 * other record is open and only counted. Grand totals are summed from the
 * groups in workplace id order.
 */
export function aggregateRecords(
	records: readonly TimeRecord[],
	workplaces: readonly Workplace[],
	window: ReportWindow,
	now: Date,
): Report {
	assertWindow(window);

	const workplaceById = new Map(workplaces.map((workplace) => [workplace.id, workplace]));
	const groups = new Map<number, WorkplaceTotals>();
	const start = window.start.getTime();
	const end = window.end.getTime();

	for (const record of records) {
		const startedAt = record.startTime.getTime();
		if (startedAt < start || startedAt >= end) {
			continue;
		}

		let group = groups.get(record.workplaceId);
		if (!group) {
			const workplace = workplaceById.get(record.workplaceId);
			group = {
				workplaceId: record.workplaceId,
				workplaceName: workplace?.name ?? null,
				rate: workplace?.rate ?? 0,
				durationMs: 0,
				earnings: 0,
				recordCount: 0,
				openRecords: 0,
				unknownWorkplace: workplace === undefined,
			};
			groups.set(record.workplaceId, group);
		}

		if (record.endTime === null || record.endTime.getTime() > now.getTime()) {
			group.openRecords += 1;
			continue;
		}

		const durationMs = record.endTime.getTime() - startedAt;
		group.durationMs += durationMs;
		group.earnings += (durationMs / MS_PER_HOUR) * group.rate;
		group.recordCount += 1;
	}

	const ordered = [...groups.values()].sort((a, b) => a.workplaceId - b.workplaceId);

	let totalDurationMs = 0;
	let totalEarnings = 0;
	let closedRecords = 0;
	let openRecords = 0;
	for (const group of ordered) {
		totalDurationMs += group.durationMs;
		totalEarnings += group.earnings;
		closedRecords += group.recordCount;
		openRecords += group.openRecords;
	}

	return {
		window: { start: new Date(start), end: new Date(end) },
		generatedAt: new Date(now.getTime()),
		groups: ordered,
		totalDurationMs,
		totalEarnings,
		closedRecords,
		openRecords,
	};
}

// ============================================
// Presentation Helpers
// ============================================

export function roundCurrency(amount: number): number {
	return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export function toHours(durationMs: number, fractionDigits = 2): number {
	const factor = 10 ** fractionDigits;
	return Math.round((durationMs / MS_PER_HOUR) * factor) / factor;
}

// ============================================
// Export
// ============================================

export interface RecordRow {
	recordId: number;
	workplaceId: number;
	workplaceName: string | null;
	startTime: Date;
	endTime: Date | null;
	/** Zero while the record is open */
	durationMs: number;
	earnings: number;
	note: string | null;
	open: boolean;
}

/**
 * One row per record started in `window`, ordered by start time. Open
 * records carry no duration or earnings, as in `aggregateRecords`.
 */
export function exportRows(
	records: readonly TimeRecord[],
	workplaces: readonly Workplace[],
	window: ReportWindow,
	now: Date,
): RecordRow[] {
	assertWindow(window);

	const workplaceById = new Map(workplaces.map((workplace) => [workplace.id, workplace]));
	const start = window.start.getTime();
	const end = window.end.getTime();

	return records
		.filter((record) => record.startTime.getTime() >= start && record.startTime.getTime() < end)
		.sort((a, b) => a.startTime.getTime() - b.startTime.getTime() || a.id - b.id)
		.map((record) => {
			const workplace = workplaceById.get(record.workplaceId);
			const endTime = record.endTime;
			const open = endTime === null || endTime.getTime() > now.getTime();
			const durationMs = endTime === null || open ? 0 : endTime.getTime() - record.startTime.getTime();
			return {
				recordId: record.id,
				workplaceId: record.workplaceId,
				workplaceName: workplace?.name ?? null,
				startTime: record.startTime,
				endTime: record.endTime,
				durationMs,
				earnings: (durationMs / MS_PER_HOUR) * (workplace?.rate ?? 0),
				note: record.note,
				open,
			};
		});
}

// ============================================
// Efficiency
// ============================================

export const TARGET_DAILY_HOURS = 8;

export type EfficiencyLevel = "insufficient_data" | "low" | "moderate" | "high";

export interface EfficiencyMetrics {
	days: number;
	totalDurationMs: number;
	totalEarnings: number;
	averageDailyHours: number;
	/** Average daily hours as a share of the target day, capped at 100 */
	efficiencyScore: number;
	level: EfficiencyLevel;
}

/**
 * Daily averages over a report spanning `days` days.
 */
export function efficiencyMetrics(report: Report, days: number): EfficiencyMetrics {
	if (!Number.isInteger(days) || days < 1) {
		throw new ValidationError("Days must be a positive whole number", [
			{ path: "days", message: "Must be a positive integer" },
		]);
	}

	const averageDailyHours = report.totalDurationMs / MS_PER_HOUR / days;
	const efficiencyScore = Math.min(100, (averageDailyHours / TARGET_DAILY_HOURS) * 100);

	let level: EfficiencyLevel;
	if (report.closedRecords + report.openRecords === 0) {
		level = "insufficient_data";
	} else if (efficiencyScore < 50) {
		level = "low";
	} else if (efficiencyScore < 80) {
		level = "moderate";
	} else {
		level = "high";
	}

	return {
		days,
		totalDurationMs: report.totalDurationMs,
		totalEarnings: report.totalEarnings,
		averageDailyHours,
		efficiencyScore,
		level,
	};
}
