import { InMemoryStore } from "@shiftlog/storage";
import { describe, expect, it } from "vitest";
import { createRunContext } from "../../testing/fakes.js";
import { createRetentionCleanup } from "./retention-cleanup.js";

describe("retention-cleanup", () => {
	it("deletes expired records, then workplaces without records", async () => {
		const store = new InMemoryStore();
		await store.users.register({ id: "u1" });
		const old = await store.workplaces.create("u1", { name: "Old job", rate: 10 });
		const current = await store.workplaces.create("u1", { name: "Current job", rate: 12 });
		await store.workplaces.create("u1", { name: "Never used", rate: 8 });
		await store.records.create("u1", {
			workplaceId: old.id,
			startTime: new Date("2024-05-20T08:00:00Z"),
			endTime: new Date("2024-05-20T12:00:00Z"),
			note: null,
		});
		const kept = await store.records.create("u1", {
			workplaceId: current.id,
			startTime: new Date("2024-06-20T08:00:00Z"),
			endTime: new Date("2024-06-20T12:00:00Z"),
			note: null,
		});
		const job = createRetentionCleanup({ store, retentionDays: 30, timezone: "UTC" });

		const result = await job.callback(createRunContext("2024-07-01T02:00:00Z"));

		expect(result).toEqual({ processed: 3, failed: 0 });
		const remaining = await store.records.listStartedBetween("u1", new Date(0), new Date("2100-01-01T00:00:00Z"));
		expect(remaining.map((record) => record.id)).toEqual([kept.id]);
		const workplaces = await store.workplaces.listByUser("u1");
		expect(workplaces.map((workplace) => workplace.name)).toEqual(["Current job"]);
	});

	it("runs monthly in the service zone", () => {
		const job = createRetentionCleanup({ store: new InMemoryStore(), retentionDays: 365, timezone: "Europe/Berlin" });

		expect(job.trigger).toEqual({ kind: "cron", expression: "0 2 1 * *", timezone: "Europe/Berlin" });
	});
});
