/**
 * Report Periods
 *
 * Resolve a named period to a UTC window in the user's zone. Every window
 * ends at the start of the local day after its last day.
 */

import {
	addLocalDays,
	type CalendarDate,
	localDate,
	type ReportWindow,
	toLocal,
	toUtc,
	ValidationError,
} from "@shiftlog/domain";
import { z } from "zod";

export const ReportPeriodSchema = z.enum(["today", "week", "month", "custom"]);
export type ReportPeriod = z.infer<typeof ReportPeriodSchema>;

/** Days before today covered by each named period */
const LOOKBACK_DAYS = {
	today: 0,
	week: 7,
	month: 30,
} as const;

function compareDates(a: CalendarDate, b: CalendarDate): number {
	return a.year - b.year || a.month - b.month || a.day - b.day;
}

/** Window covering local calendar days `first`..`last` inclusive */
export function localDaysWindow(first: CalendarDate, last: CalendarDate, zone: string): ReportWindow {
	if (compareDates(last, first) < 0) {
		throw new ValidationError("End date is before start date", [
			{ path: "end", message: "Must not be before the start date" },
		]);
	}
	const start = localDate(first.year, first.month, first.day);
	const end = addLocalDays(localDate(last.year, last.month, last.day), 1);
	return { start: toUtc(start, zone), end: toUtc(end, zone) };
}

export function resolvePeriodWindow(
	period: ReportPeriod,
	zone: string,
	now: Date,
	custom?: { start: CalendarDate; end: CalendarDate },
): ReportWindow {
	if (period === "custom") {
		if (!custom) {
			throw new ValidationError("Custom period needs start and end dates", [
				{ path: "start", message: "Required for a custom period" },
			]);
		}
		return localDaysWindow(custom.start, custom.end, zone);
	}

	const today = toLocal(now, zone);
	const first = addLocalDays(localDate(today.year, today.month, today.day), -LOOKBACK_DAYS[period]);
	return localDaysWindow(first, today, zone);
}

/** The last `days` local days, today included */
export function trailingDaysWindow(days: number, zone: string, now: Date): ReportWindow {
	const today = toLocal(now, zone);
	const first = addLocalDays(localDate(today.year, today.month, today.day), 1 - days);
	return localDaysWindow(first, today, zone);
}
