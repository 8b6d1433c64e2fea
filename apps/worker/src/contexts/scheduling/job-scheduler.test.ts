import { NotFoundError, ValidationError } from "@shiftlog/domain";
import { afterEach, describe, expect, it } from "vitest";
import { deferred, ManualClock, RecordingEventSink } from "../../testing/fakes.js";
import { type JobResult, JobScheduler, SchedulerStoppingError, SKIPPED_REASON } from "./job-scheduler.js";

const DONE: JobResult = { processed: 1, failed: 0 };

describe("JobScheduler", () => {
	let scheduler: JobScheduler | null = null;

	afterEach(async () => {
		await scheduler?.stop(0);
		scheduler = null;
	});

	it("skips a weekly-report firing while the previous run is still executing", async () => {
		const clock = new ManualClock("2024-06-16T22:50:00Z");
		scheduler = new JobScheduler({ now: clock.now });
		const release = deferred();
		let concurrent = 0;
		let maxConcurrent = 0;

		scheduler.register({ id: "weekly-report" }, { kind: "cron", expression: "*/15 * * * *", timezone: "UTC" }, async () => {
			concurrent++;
			maxConcurrent = Math.max(maxConcurrent, concurrent);
			await release.promise;
			concurrent--;
			return DONE;
		});

		const first = scheduler.tick(new Date("2024-06-16T23:00:00Z"));
		expect(scheduler.getJobStatus()["weekly-report"]?.running).toBe(true);

		await scheduler.tick(new Date("2024-06-16T23:15:00Z"));
		const skipped = scheduler.getJobStatus()["weekly-report"];
		expect(skipped?.lastOutcome).toEqual({
			status: "skipped",
			firedAt: new Date("2024-06-16T23:15:00Z"),
			reason: SKIPPED_REASON,
		});
		expect(skipped?.skipCount).toBe(1);

		release.resolve();
		await first;

		const status = scheduler.getJobStatus()["weekly-report"];
		expect(maxConcurrent).toBe(1);
		expect(status?.runCount).toBe(1);
		expect(status?.running).toBe(false);
		expect(status?.history.map((outcome) => outcome.status)).toEqual(["skipped", "succeeded"]);
		expect(status?.nextFireAt).toEqual(new Date("2024-06-16T23:30:00Z"));
	});

	it("does not catch up missed firings", async () => {
		const clock = new ManualClock("2024-06-16T00:00:00Z");
		scheduler = new JobScheduler({ now: clock.now });
		const firedAts: Date[] = [];

		scheduler.register({ id: "heartbeat" }, { kind: "interval", everyMs: 60_000 }, async ({ firedAt }) => {
			firedAts.push(firedAt);
			return DONE;
		});

		await scheduler.tick(new Date("2024-06-16T00:05:00Z"));

		expect(firedAts).toEqual([new Date("2024-06-16T00:01:00Z")]);
		expect(scheduler.getJobStatus().heartbeat?.nextFireAt).toEqual(new Date("2024-06-16T00:06:00Z"));
	});

	it("does not fire before the next fire time", async () => {
		const clock = new ManualClock("2024-06-16T00:00:00Z");
		scheduler = new JobScheduler({ now: clock.now });
		let runs = 0;
		scheduler.register({ id: "heartbeat" }, { kind: "interval", everyMs: 60_000 }, async () => {
			runs++;
			return DONE;
		});

		await scheduler.tick(new Date("2024-06-16T00:00:59Z"));
		expect(runs).toBe(0);
	});

	it("isolates a failing job from the others", async () => {
		const clock = new ManualClock("2024-06-16T00:00:00Z");
		const events = new RecordingEventSink();
		scheduler = new JobScheduler({ now: clock.now, events });

		scheduler.register({ id: "broken" }, { kind: "interval", everyMs: 1_000 }, async () => {
			throw new Error("storage exploded");
		});
		scheduler.register({ id: "healthy" }, { kind: "interval", everyMs: 1_000 }, async () => DONE);

		clock.advance(1_000);
		await scheduler.tick();

		const status = scheduler.getJobStatus();
		expect(status.broken?.lastOutcome).toMatchObject({ status: "failed", error: 'Job "broken" failed: storage exploded' });
		expect(status.broken?.running).toBe(false);
		expect(status.broken?.failureCount).toBe(1);
		expect(status.broken?.lastSuccessAt).toBeNull();
		expect(status.healthy?.lastOutcome).toMatchObject({ status: "succeeded", result: DONE });
		expect(status.healthy?.lastSuccessAt).toEqual(new Date("2024-06-16T00:00:01Z"));

		expect(events.ofType("job_failed")).toEqual([
			expect.objectContaining({ type: "job_failed", jobId: "broken", error: 'Job "broken" failed: storage exploded' }),
		]);
	});

	it("keeps running when the failure event cannot be delivered", async () => {
		const clock = new ManualClock("2024-06-16T00:00:00Z");
		const events = new RecordingEventSink();
		events.available = false;
		scheduler = new JobScheduler({ now: clock.now, events });
		scheduler.register({ id: "broken" }, { kind: "interval", everyMs: 1_000 }, async () => {
			throw new Error("boom");
		});

		clock.advance(1_000);
		await expect(scheduler.tick()).resolves.toBeUndefined();
		expect(scheduler.getJobStatus().broken?.lastOutcome?.status).toBe("failed");
	});

	it("runs jobs manually through the single-flight path", async () => {
		const clock = new ManualClock("2024-06-16T00:00:00Z");
		scheduler = new JobScheduler({ now: clock.now });
		const release = deferred();
		scheduler.register({ id: "backup-trigger" }, { kind: "interval", everyMs: 86_400_000 }, async () => {
			await release.promise;
			return DONE;
		});

		const first = scheduler.triggerJob("backup-trigger");
		const second = await scheduler.triggerJob("backup-trigger");
		expect(second).toMatchObject({ status: "skipped", reason: SKIPPED_REASON });

		release.resolve();
		await expect(first).resolves.toMatchObject({ status: "succeeded", result: DONE });
	});

	it("rejects manual runs of unknown jobs", async () => {
		scheduler = new JobScheduler();
		await expect(scheduler.triggerJob("nope")).rejects.toBeInstanceOf(NotFoundError);
	});

	it("refuses manual runs once stopping", async () => {
		let runs = 0;
		scheduler = new JobScheduler();
		scheduler.register({ id: "backup-trigger" }, { kind: "interval", everyMs: 86_400_000 }, async () => {
			runs++;
			return DONE;
		});

		await scheduler.stop(0);

		await expect(scheduler.triggerJob("backup-trigger")).rejects.toBeInstanceOf(SchedulerStoppingError);
		expect(runs).toBe(0);
		expect(scheduler.getJobStatus()["backup-trigger"]?.runCount).toBe(0);
	});

	it("rejects duplicate ids and malformed triggers", () => {
		scheduler = new JobScheduler();
		scheduler.register({ id: "a" }, { kind: "interval", everyMs: 1_000 }, async () => DONE);

		expect(() => scheduler?.register({ id: "a" }, { kind: "interval", everyMs: 1_000 }, async () => DONE)).toThrow(
			ValidationError,
		);
		expect(() =>
			scheduler?.register({ id: "b" }, { kind: "cron", expression: "not a cron", timezone: "UTC" }, async () => DONE),
		).toThrow(ValidationError);
		expect(() =>
			scheduler?.register({ id: "c" }, { kind: "cron", expression: "0 3 * * *", timezone: "Mars/Base" }, async () => DONE),
		).toThrow(ValidationError);
		expect(() => scheduler?.register({ id: "d" }, { kind: "interval", everyMs: 0 }, async () => DONE)).toThrow(
			ValidationError,
		);
	});

	describe("stop", () => {
		it("cancels cooperative runs and reports stuck ones as pending", async () => {
			const clock = new ManualClock("2024-06-16T00:00:00Z");
			scheduler = new JobScheduler({ now: clock.now });
			const stuck = deferred();

			scheduler.register({ id: "cooperative" }, { kind: "interval", everyMs: 1_000 }, async ({ signal }) => {
				await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
				return { processed: 0, failed: 0 };
			});
			scheduler.register({ id: "stuck" }, { kind: "interval", everyMs: 1_000 }, async () => {
				await stuck.promise;
				return DONE;
			});

			clock.advance(1_000);
			const runs = scheduler.tick();
			const result = await scheduler.stop(20);

			expect(result).toEqual({ completed: ["cooperative"], pending: ["stuck"] });
			expect(scheduler.getJobStatus().cooperative?.lastOutcome?.status).toBe("cancelled");

			stuck.resolve();
			await runs;
			expect(scheduler.getJobStatus().stuck?.lastOutcome?.status).toBe("cancelled");
			expect(scheduler.getJobStatus().stuck?.running).toBe(false);
		});

		it("records a run that throws on abort as cancelled", async () => {
			const clock = new ManualClock("2024-06-16T00:00:00Z");
			scheduler = new JobScheduler({ now: clock.now });

			scheduler.register({ id: "sweep" }, { kind: "interval", everyMs: 1_000 }, async ({ signal }) => {
				await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
				signal.throwIfAborted();
				return DONE;
			});

			clock.advance(1_000);
			const runs = scheduler.tick();
			await expect(scheduler.stop(1_000)).resolves.toEqual({ completed: ["sweep"], pending: [] });
			await runs;
			expect(scheduler.getJobStatus().sweep?.lastOutcome?.status).toBe("cancelled");
			expect(scheduler.getJobStatus().sweep?.failureCount).toBe(0);
		});
	});

	it("reports its ledger", () => {
		const clock = new ManualClock("2024-06-16T00:00:00Z");
		scheduler = new JobScheduler({ now: clock.now, tickMs: 5_000 });
		scheduler.register({ id: "a", description: "Test job" }, { kind: "interval", everyMs: 1_000 }, async () => DONE);

		expect(scheduler.getLedger()).toMatchObject({ started: false, tickMs: 5_000, lastTickAt: null });

		scheduler.start();
		const ledger = scheduler.getLedger();
		expect(ledger.started).toBe(true);
		expect(ledger.lastTickAt).toEqual(new Date("2024-06-16T00:00:00Z"));
		expect(ledger.jobs).toEqual([
			expect.objectContaining({ id: "a", description: "Test job", nextFireAt: new Date("2024-06-16T00:00:01Z") }),
		]);
	});
});
