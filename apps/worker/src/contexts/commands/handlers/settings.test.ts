import { DependencyUnavailableError, type User } from "@shiftlog/domain";
import { InMemoryStore } from "@shiftlog/storage";
import { describe, expect, it, vi } from "vitest";
import { log } from "../../../shared/logger.js";
import type { TimezoneLookupClient } from "../../timezone/lookup-client.js";
import { TimezoneResolver } from "../../timezone/timezone-resolver.js";
import type { HandlerContext } from "../pipeline.js";
import { createSettingsHandler } from "./settings.js";

const NOW = new Date("2024-01-15T12:00:00Z");

async function setup() {
	const store = new InMemoryStore({ now: () => NOW });
	const { user } = await store.users.register({ id: "u1" });
	const lookup = {
		byPosition: vi.fn<TimezoneLookupClient["byPosition"]>(),
		byZone: vi.fn<TimezoneLookupClient["byZone"]>(),
	};
	const resolver = new TimezoneResolver({ lookup, users: store.users, now: () => NOW });
	const handler = createSettingsHandler({ users: store.users, resolver });
	return { store, user, lookup, handler };
}

function context(user: User, args: Record<string, unknown>): HandlerContext {
	return {
		envelope: { userId: user.id, commandClass: "settings", arguments: args, receivedAt: NOW },
		user,
		args,
		now: NOW,
		log,
	};
}

describe("settings handler", () => {
	it("stores the zone found for coordinates", async () => {
		const { store, user, lookup, handler } = await setup();
		lookup.byPosition.mockResolvedValue({ zoneName: "Asia/Tokyo", utcOffsetSeconds: 32_400 });

		const result = await handler(context(user, { lat: "35.68", lng: "139.69" }));

		expect(result).toEqual({
			kind: "timezone",
			zone: { zoneName: "Asia/Tokyo", utcOffsetSeconds: 32_400, source: "lookup" },
		});
		expect(lookup.byPosition).toHaveBeenCalledWith(35.68, 139.69);
		expect((await store.users.findById("u1"))?.timezone).toBe("Asia/Tokyo");
	});

	it("falls back to the local zone database for names", async () => {
		const { store, user, lookup, handler } = await setup();
		lookup.byZone.mockRejectedValue(new DependencyUnavailableError("timezone", "Timezone lookup returned HTTP 503"));

		const result = await handler(context(user, { timezone: "Europe/Berlin" }));

		expect(result).toEqual({
			kind: "timezone",
			zone: { zoneName: "Europe/Berlin", utcOffsetSeconds: 3_600, source: "local" },
		});
		expect((await store.users.findById("u1"))?.timezone).toBe("Europe/Berlin");
	});

	it("leaves the stored zone alone when nothing resolves", async () => {
		const { store, user, lookup, handler } = await setup();
		lookup.byPosition.mockRejectedValue(new DependencyUnavailableError("timezone", "Timezone lookup returned HTTP 503"));
		await store.users.updateTimezone("u1", "Mars/Olympus");

		await expect(handler(context(user, { lat: 0, lng: 0 }))).rejects.toBeInstanceOf(DependencyUnavailableError);
		expect((await store.users.findById("u1"))?.timezone).toBe("Mars/Olympus");
	});

	it("rejects arguments that are neither a name nor coordinates", async () => {
		const { user, handler } = await setup();

		await expect(handler(context(user, { zone: "UTC" }))).rejects.toThrow("Invalid settings");
	});
});
