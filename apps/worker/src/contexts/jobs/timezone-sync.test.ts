import { ValidationError, type ZoneInfo } from "@shiftlog/domain";
import { InMemoryStore } from "@shiftlog/storage";
import { describe, expect, it, vi } from "vitest";
import { createRunContext } from "../../testing/fakes.js";
import type { ResolveOptions } from "../timezone/timezone-resolver.js";
import { createTimezoneSync } from "./timezone-sync.js";

const CANONICAL: Record<string, string> = {
	"US/Eastern": "America/New_York",
	UTC: "UTC",
};

describe("timezone-sync", () => {
	it("stores canonical zone names and counts failures", async () => {
		const store = new InMemoryStore();
		for (const [id, timezone] of [
			["a", "US/Eastern"],
			["b", "UTC"],
			["c", "Broken/Zone"],
		] as const) {
			await store.users.register({ id });
			await store.users.updateTimezone(id, timezone);
		}
		const resolveByName = vi.fn(async (zoneName: string, _options?: ResolveOptions): Promise<ZoneInfo> => {
			const canonical = CANONICAL[zoneName];
			if (!canonical) {
				throw new ValidationError(`Unknown zone ${zoneName}`, [{ path: "zone", message: "Unknown" }]);
			}
			return { zoneName: canonical, utcOffsetSeconds: 0, source: "lookup" };
		});
		const job = createTimezoneSync({ store, resolver: { resolveByName }, timezone: "UTC" });

		const result = await job.callback(createRunContext("2024-06-16T04:00:00Z"));

		expect(result).toEqual({ processed: 1, failed: 1 });
		expect((await store.users.findById("a"))?.timezone).toBe("America/New_York");
		expect((await store.users.findById("b"))?.timezone).toBe("UTC");
		expect((await store.users.findById("c"))?.timezone).toBe("Broken/Zone");
		expect(resolveByName).toHaveBeenCalledWith("US/Eastern", { userId: "a" });
	});
});
