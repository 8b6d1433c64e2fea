import { DependencyUnavailableError } from "@shiftlog/domain";
import { describe, expect, it } from "vitest";
import { createRunContext, RecordingEventSink } from "../../testing/fakes.js";
import { createBackupTrigger } from "./backup-trigger.js";

describe("backup-trigger", () => {
	it("requests a backup tagged with the run id", async () => {
		const events = new RecordingEventSink();
		const job = createBackupTrigger({ events, timezone: "UTC" });

		const result = await job.callback(createRunContext("2024-06-16T03:00:00Z", { runId: "run-42" }));

		expect(result).toEqual({ processed: 1, failed: 0 });
		expect(events.events).toEqual([
			{ type: "backup_requested", occurredAt: "2024-06-16T03:00:00.000Z", runId: "run-42" },
		]);
		expect(job.trigger).toEqual({ kind: "cron", expression: "0 3 * * *", timezone: "UTC" });
	});

	it("fails the run when the request cannot be delivered", async () => {
		const events = new RecordingEventSink();
		events.available = false;
		const job = createBackupTrigger({ events, timezone: "UTC" });

		await expect(job.callback(createRunContext("2024-06-16T03:00:00Z"))).rejects.toBeInstanceOf(
			DependencyUnavailableError,
		);
	});
});
