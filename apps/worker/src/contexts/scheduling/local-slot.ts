/**
 * User-Local Slots
 *
 * User-local jobs run on a quarter-hour UTC cron and pick the users whose
 * wall clock at the fire time reads `[hour:00, hour:15)`. Every real UTC
 * offset is a multiple of 15 minutes, so each user matches once per day
 * (or per week when a weekday is set).
 */

import { isValidTimeZone, localWeekday, type User, toLocal } from "@shiftlog/domain";

export const QUARTER_HOUR_CRON = "*/15 * * * *";

const SLOT_MINUTES = 15;

export interface LocalSlot {
	hour: number;
	/** 0 = Sunday ... 6 = Saturday */
	weekday?: number;
}

export function isInLocalSlot(instant: Date, zone: string, slot: LocalSlot): boolean {
	const local = toLocal(instant, zone);
	if (local.hour !== slot.hour || local.minute >= SLOT_MINUTES) {
		return false;
	}
	return slot.weekday === undefined || localWeekday(local) === slot.weekday;
}

/**
 * Users due at `instant`. Users with an unknown stored zone are returned
 * separately so the caller can log them.
 */
export function selectUsersInSlot(
	users: readonly User[],
	instant: Date,
	slot: LocalSlot,
): { due: User[]; invalidZone: User[] } {
	const due: User[] = [];
	const invalidZone: User[] = [];

	for (const user of users) {
		if (!isValidTimeZone(user.timezone)) {
			invalidZone.push(user);
		} else if (isInLocalSlot(instant, user.timezone, slot)) {
			due.push(user);
		}
	}

	return { due, invalidZone };
}
