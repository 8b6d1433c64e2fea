/**
 * Timezone Sync
 *
 * Daily: re-resolves every stored zone name and stores the canonical one,
 * so aliases such as "US/Eastern" converge on "America/New_York".
 */

import type { TimeTrackingStore } from "@shiftlog/storage";
import type { TimezoneResolver } from "../timezone/timezone-resolver.js";
import { forEachUser, type ScheduledJob } from "./types.js";

export const TIMEZONE_SYNC_ID = "timezone-sync";

export interface TimezoneSyncDeps {
	store: Pick<TimeTrackingStore, "users">;
	resolver: Pick<TimezoneResolver, "resolveByName">;
	timezone: string;
}

export function createTimezoneSync(deps: TimezoneSyncDeps): ScheduledJob {
	return {
		descriptor: {
			id: TIMEZONE_SYNC_ID,
			description: "Canonicalize stored user time zones",
		},
		trigger: { kind: "cron", expression: "0 4 * * *", timezone: deps.timezone },
		callback: async (context) => {
			const users = await deps.store.users.listAll();

			return forEachUser(users, context, async (user) => {
				const info = await deps.resolver.resolveByName(user.timezone, { userId: user.id });
				if (info.zoneName === user.timezone) {
					return 0;
				}

				await deps.store.users.updateTimezone(user.id, info.zoneName);
				context.log.info({ userId: user.id, from: user.timezone, to: info.zoneName }, "User time zone updated");
				return 1;
			});
		},
	};
}
