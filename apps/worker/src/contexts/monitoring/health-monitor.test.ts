import { InMemoryStore } from "@shiftlog/storage";
import { afterEach, describe, expect, it, vi } from "vitest";
import { RecordingEventSink } from "../../testing/fakes.js";
import type { JobStatus, SchedulerLedger } from "../scheduling/job-scheduler.js";
import { HealthMonitor } from "./health-monitor.js";

const NOW = new Date("2024-06-16T12:00:00Z");

function ledger(overrides: Partial<SchedulerLedger> = {}): SchedulerLedger {
	return {
		started: true,
		tickMs: 30_000,
		lastTickAt: new Date(NOW.getTime() - 10_000),
		jobs: [],
		...overrides,
	};
}

function job(id: string, nextFireAt: Date | null): JobStatus {
	return {
		id,
		description: null,
		trigger: { kind: "interval", everyMs: 60_000 },
		running: false,
		lastRunAt: null,
		lastFinishedAt: null,
		lastSuccessAt: null,
		lastOutcome: null,
		nextFireAt,
		runCount: 0,
		skipCount: 0,
		failureCount: 0,
		history: [],
	};
}

function createMonitor(
	options: { store?: InMemoryStore; events?: RecordingEventSink; getLedger?: () => SchedulerLedger } = {},
): HealthMonitor {
	return new HealthMonitor({
		store: options.store ?? new InMemoryStore(),
		events: options.events ?? new RecordingEventSink(),
		scheduler: { getLedger: options.getLedger ?? (() => ledger()) },
		probeTimeoutMs: 50,
		now: () => NOW,
	});
}

describe("HealthMonitor", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("reports healthy when every component is up", async () => {
		const verdict = await createMonitor().check();

		expect(verdict.status).toBe("healthy");
		expect(verdict.checkedAt).toEqual(NOW);
		expect(verdict.components.storage).toMatchObject({ status: "up", message: "Store answered ping" });
		expect(verdict.components.messaging).toMatchObject({ status: "up", message: "Event sink reachable" });
		expect(verdict.components.scheduler).toMatchObject({
			status: "up",
			message: "Tick loop running",
			details: { tickMs: 30_000, lastTickAt: "2024-06-16T11:59:50.000Z", jobs: 0 },
		});
	});

	it("degrades when the store is unreachable", async () => {
		const store = new InMemoryStore();
		store.setAvailable(false);

		const verdict = await createMonitor({ store }).check();

		expect(verdict.status).toBe("degraded");
		expect(verdict.components.storage).toMatchObject({ status: "down", message: "In-memory store is unavailable" });
		expect(verdict.components.messaging.status).toBe("up");
	});

	it("bounds a hanging probe by the timeout", async () => {
		const monitor = new HealthMonitor({
			store: new InMemoryStore(),
			events: { probe: () => new Promise<void>(() => undefined) },
			scheduler: { getLedger: () => ledger() },
			probeTimeoutMs: 20,
			now: () => NOW,
		});

		const verdict = await monitor.check();

		expect(verdict.status).toBe("degraded");
		expect(verdict.components.messaging).toMatchObject({
			status: "down",
			message: "messaging probe timed out after 20ms",
		});
	});

	it("marks the scheduler down when the tick loop is not running", async () => {
		const verdict = await createMonitor({ getLedger: () => ledger({ started: false }) }).check();

		expect(verdict.components.scheduler).toMatchObject({ status: "down", message: "Tick loop is not running" });
	});

	it("marks the scheduler down when ticks stop", async () => {
		const verdict = await createMonitor({
			getLedger: () => ledger({ lastTickAt: new Date(NOW.getTime() - 100_000) }),
		}).check();

		expect(verdict.components.scheduler).toMatchObject({ status: "down", message: "No tick for 100000ms" });
	});

	it("marks the scheduler down when a job is overdue", async () => {
		const verdict = await createMonitor({
			getLedger: () =>
				ledger({
					jobs: [
						job("backup-trigger", new Date(NOW.getTime() + 60_000)),
						job("weekly-report", new Date(NOW.getTime() - 120_000)),
						job("retention-cleanup", null),
					],
				}),
		}).check();

		expect(verdict.components.scheduler).toMatchObject({ status: "down", message: "Jobs overdue: weekly-report" });
	});

	it("never throws, even when a probe throws synchronously", async () => {
		const monitor = createMonitor({
			getLedger: () => {
				throw new Error("ledger unavailable");
			},
		});

		const verdict = await monitor.check();

		expect(verdict.components.scheduler).toMatchObject({ status: "down", message: "ledger unavailable" });
		expect(monitor.getLastVerdict()).toBe(verdict);
	});

	it("checks periodically once started", async () => {
		vi.useFakeTimers();
		const monitor = createMonitor();
		expect(monitor.getLastVerdict()).toBeNull();

		monitor.start(1_000);
		await vi.advanceTimersByTimeAsync(1_000);
		await vi.waitFor(() => expect(monitor.getLastVerdict()?.status).toBe("healthy"));
		monitor.stop();
	});
});
