import { afterEach, describe, expect, it } from "vitest";
import type { HealthVerdict } from "../contexts/monitoring/health-monitor.js";
import { JobScheduler } from "../contexts/scheduling/job-scheduler.js";
import { ManualClock } from "../testing/fakes.js";
import { createHealthApp } from "./health-server.js";

const CHECKED_AT = new Date("2024-06-16T12:00:00Z");

function verdict(status: HealthVerdict["status"]): HealthVerdict {
	const down = status === "degraded";
	return {
		status,
		checkedAt: CHECKED_AT,
		components: {
			storage: { status: "up", latencyMs: 2, message: "Store answered ping" },
			messaging: down
				? { status: "down", latencyMs: 50, message: "messaging probe timed out after 50ms" }
				: { status: "up", latencyMs: 3, message: "Event sink reachable" },
			scheduler: { status: "up", latencyMs: 0, message: "Tick loop running", details: { tickMs: 30_000 } },
		},
	};
}

describe("health server", () => {
	const clock = new ManualClock("2024-06-16T12:00:00Z");
	let scheduler: JobScheduler;

	afterEach(async () => {
		await scheduler.stop(0);
	});

	function createApp(status: HealthVerdict["status"] = "healthy") {
		scheduler = new JobScheduler({ now: clock.now });
		return createHealthApp({
			monitor: { check: async () => verdict(status) },
			scheduler,
			startedAt: new Date("2024-06-16T11:00:00Z"),
			now: clock.now,
		});
	}

	it("answers 200 with the verdict when healthy", async () => {
		const response = await createApp().request("/health");

		expect(response.status).toBe(200);
		expect(await response.json()).toEqual({
			status: "healthy",
			checked_at: "2024-06-16T12:00:00.000Z",
			components: {
				storage: { status: "up", latency_ms: 2, message: "Store answered ping", details: null },
				messaging: { status: "up", latency_ms: 3, message: "Event sink reachable", details: null },
				scheduler: { status: "up", latency_ms: 0, message: "Tick loop running", details: { tickMs: 30_000 } },
			},
			uptime_ms: 3_600_000,
			started_at: "2024-06-16T11:00:00.000Z",
		});
	});

	it("answers 503 when degraded", async () => {
		const response = await createApp("degraded").request("/health");

		expect(response.status).toBe(503);
		expect(await response.json()).toMatchObject({
			status: "degraded",
			components: { messaging: { status: "down", message: "messaging probe timed out after 50ms" } },
		});
	});

	it("lists registered jobs", async () => {
		const app = createApp();
		scheduler.register(
			{ id: "backup-trigger", description: "Request a database backup" },
			{ kind: "cron", expression: "0 3 * * *", timezone: "UTC" },
			async () => ({ processed: 1, failed: 0 }),
		);

		const response = await app.request("/jobs");

		expect(await response.json()).toEqual({
			jobs: [
				{
					id: "backup-trigger",
					description: "Request a database backup",
					trigger: 'cron "0 3 * * *" (UTC)',
					running: false,
					last_run: null,
					last_success: null,
					next_run: "2024-06-17T03:00:00.000Z",
					run_count: 0,
					skip_count: 0,
					failure_count: 0,
					last_outcome: null,
				},
			],
		});
	});

	it("triggers a job on demand", async () => {
		const app = createApp();
		scheduler.register({ id: "backup-trigger" }, { kind: "interval", everyMs: 60_000 }, async () => ({
			processed: 1,
			failed: 0,
		}));

		const response = await app.request("/jobs/backup-trigger/trigger", { method: "POST" });

		expect(response.status).toBe(200);
		expect(await response.json()).toMatchObject({
			job: "backup-trigger",
			status: "succeeded",
			fired_at: "2024-06-16T12:00:00.000Z",
			duration_ms: 0,
			processed: 1,
			failed: 0,
		});
	});

	it("answers 500 when the triggered run fails", async () => {
		const app = createApp();
		scheduler.register({ id: "flaky" }, { kind: "interval", everyMs: 60_000 }, async () => {
			throw new Error("boom");
		});

		const response = await app.request("/jobs/flaky/trigger", { method: "POST" });

		expect(response.status).toBe(500);
		expect(await response.json()).toMatchObject({ job: "flaky", status: "failed", error: 'Job "flaky" failed: boom' });
	});

	it("answers 503 to triggers after the scheduler began stopping", async () => {
		const app = createApp();
		scheduler.register({ id: "backup-trigger" }, { kind: "interval", everyMs: 60_000 }, async () => ({
			processed: 1,
			failed: 0,
		}));
		await scheduler.stop(0);

		const response = await app.request("/jobs/backup-trigger/trigger", { method: "POST" });

		expect(response.status).toBe(503);
		expect(await response.json()).toEqual({ error: "Scheduler is stopping" });
	});

	it("answers 404 for unknown jobs and paths", async () => {
		const app = createApp();

		const unknownJob = await app.request("/jobs/nope/trigger", { method: "POST" });
		expect(unknownJob.status).toBe(404);
		expect(await unknownJob.json()).toEqual({ error: "Unknown job: nope" });

		const unknownPath = await app.request("/reload", { method: "POST" });
		expect(unknownPath.status).toBe(404);
	});
});
