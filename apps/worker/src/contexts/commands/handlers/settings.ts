/**
 * Settings Handler
 *
 * Sets the user's time zone from a zone name or from coordinates.
 */

import { isValidTimeZone, parseInput, ValidationError } from "@shiftlog/domain";
import type { UserStore } from "@shiftlog/storage";
import { z } from "zod";
import type { TimezoneResolver } from "../../timezone/timezone-resolver.js";
import type { CommandHandler } from "../pipeline.js";

const SettingsArgsSchema = z.union([
	z.object({ timezone: z.string().trim().min(1) }),
	z.object({ lat: z.coerce.number(), lng: z.coerce.number() }),
]);

export interface SettingsHandlerDeps {
	users: Pick<UserStore, "updateTimezone">;
	resolver: Pick<TimezoneResolver, "resolveByName" | "resolveByCoordinates">;
}

export function createSettingsHandler(deps: SettingsHandlerDeps): CommandHandler {
	return async ({ user, args, log }) => {
		const request = parseInput(SettingsArgsSchema, args, "settings");

		const zone =
			"timezone" in request
				? await deps.resolver.resolveByName(request.timezone, { userId: user.id })
				: await deps.resolver.resolveByCoordinates(request.lat, request.lng, { userId: user.id });

		if (!isValidTimeZone(zone.zoneName)) {
			throw new ValidationError(`Time zone ${zone.zoneName} is not supported`, [
				{ path: "timezone", message: "Unsupported time zone" },
			]);
		}

		await deps.users.updateTimezone(user.id, zone.zoneName);
		log.info({ from: user.timezone, to: zone.zoneName, source: zone.source }, "Time zone updated");
		return { kind: "timezone", zone };
	};
}
