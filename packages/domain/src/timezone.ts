/**
 * Time Zone Arithmetic
 *
 * Pure conversions between UTC instants and zone-local wall clock times,
 * backed by the runtime's Intl time zone data. No network access.
 */

import { ValidationError } from "./errors.js";

// ============================================
// Types
// ============================================

/** Wall clock reading in some zone. `month` is 1-based. */
export interface LocalDateTime {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	millisecond: number;
}

/** Where a ZoneInfo came from */
export type ZoneSource = "lookup" | "cache" | "stored" | "local";

export interface ZoneInfo {
	/** Canonical IANA name */
	zoneName: string;
	/** Offset from UTC at the time of resolution */
	utcOffsetSeconds: number;
	source: ZoneSource;
}

// ============================================
// Formatters
// ============================================

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(zone: string): Intl.DateTimeFormat {
	let formatter = formatters.get(zone);
	if (!formatter) {
		formatter = new Intl.DateTimeFormat("en-US", {
			timeZone: zone,
			hourCycle: "h23",
			year: "numeric",
			month: "2-digit",
			day: "2-digit",
			hour: "2-digit",
			minute: "2-digit",
			second: "2-digit",
		});
		formatters.set(zone, formatter);
	}
	return formatter;
}

export function isValidTimeZone(zone: string): boolean {
	if (zone.trim() === "") {
		return false;
	}
	try {
		formatterFor(zone);
		return true;
	} catch {
		return false;
	}
}

/**
 * Throws ValidationError unless `zone` is a known IANA zone.
 */
export function assertTimeZone(zone: string): void {
	if (!isValidTimeZone(zone)) {
		throw new ValidationError(`Unknown time zone "${zone}"`, [
			{ path: "timezone", message: "Must be an IANA time zone name" },
		]);
	}
}

/** Canonical spelling of a zone name, e.g. "europe/paris" -> "Europe/Paris". */
export function canonicalZoneName(zone: string): string {
	assertTimeZone(zone);
	return formatterFor(zone).resolvedOptions().timeZone;
}

// ============================================
// Conversions
// ============================================

export function toLocal(instant: Date, zone: string): LocalDateTime {
	assertTimeZone(zone);
	const fields: Record<string, number> = {};
	for (const part of formatterFor(zone).formatToParts(instant)) {
		if (part.type !== "literal") {
			fields[part.type] = Number(part.value);
		}
	}

	return {
		year: fields.year ?? 0,
		month: fields.month ?? 1,
		day: fields.day ?? 1,
		// Some ICU builds render midnight as 24 even under h23
		hour: (fields.hour ?? 0) % 24,
		minute: fields.minute ?? 0,
		second: fields.second ?? 0,
		millisecond: instant.getUTCMilliseconds(),
	};
}

function wallClockMs(local: LocalDateTime): number {
	return Date.UTC(
		local.year,
		local.month - 1,
		local.day,
		local.hour,
		local.minute,
		local.second,
		local.millisecond,
	);
}

/** Offset of `zone` from UTC at `instant`, in milliseconds. */
export function offsetMsAt(instant: Date, zone: string): number {
	return wallClockMs(toLocal(instant, zone)) - instant.getTime();
}

/**
 * Instant at which the wall clock in `zone` reads `local`.
 *
 * Inside a DST gap the result is shifted by the gap length; inside an
 * overlap the earlier offset wins.
 */
export function toUtc(local: LocalDateTime, zone: string): Date {
	const wall = wallClockMs(local);
	let guess = wall - offsetMsAt(new Date(wall), zone);
	const offsetAtGuess = offsetMsAt(new Date(guess), zone);
	if (wall - guess !== offsetAtGuess) {
		guess = wall - offsetAtGuess;
	}
	return new Date(guess);
}

/**
 * Re-express a wall clock reading from `fromZone` in `toZone`.
 */
export function convert(local: LocalDateTime, fromZone: string, toZone: string): LocalDateTime {
	return toLocal(toUtc(local, fromZone), toZone);
}

export function zoneInfoFor(zone: string, at: Date, source: ZoneSource = "local"): ZoneInfo {
	return {
		zoneName: canonicalZoneName(zone),
		utcOffsetSeconds: Math.round(offsetMsAt(at, zone) / 1000),
		source,
	};
}

// ============================================
// Calendar Helpers
// ============================================

export function localDate(year: number, month: number, day: number): LocalDateTime {
	return { year, month, day, hour: 0, minute: 0, second: 0, millisecond: 0 };
}

/** Add whole calendar days, keeping the wall clock time. */
export function addLocalDays(local: LocalDateTime, days: number): LocalDateTime {
	const shifted = new Date(Date.UTC(local.year, local.month - 1, local.day + days));
	return {
		...local,
		year: shifted.getUTCFullYear(),
		month: shifted.getUTCMonth() + 1,
		day: shifted.getUTCDate(),
	};
}

/** 0 = Sunday ... 6 = Saturday */
export function localWeekday(local: LocalDateTime): number {
	return new Date(Date.UTC(local.year, local.month - 1, local.day)).getUTCDay();
}

/** First instant of the local calendar day containing `instant`. */
export function startOfLocalDay(instant: Date, zone: string): Date {
	const local = toLocal(instant, zone);
	return toUtc(localDate(local.year, local.month, local.day), zone);
}
