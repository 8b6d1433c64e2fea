/**
 * Health Monitor
 *
 * Probes the worker's collaborators and its own scheduler. Every probe is
 * bounded by a timeout; a probe that fails or times out marks its
 * component down and the verdict degraded. `check()` never throws.
 */

import { formatError, type Logger } from "@shiftlog/logger";
import type { TimeTrackingStore } from "@shiftlog/storage";
import { log as defaultLog } from "../../shared/logger.js";
import type { EventSink } from "../events/event-sink.js";
import type { JobScheduler, SchedulerLedger } from "../scheduling/job-scheduler.js";

// ============================================
// Types
// ============================================

export type ComponentName = "storage" | "messaging" | "scheduler";

export interface ComponentHealth {
	status: "up" | "down";
	latencyMs: number;
	message: string;
	details?: Record<string, unknown>;
}

export interface HealthVerdict {
	status: "healthy" | "degraded";
	checkedAt: Date;
	components: Record<ComponentName, ComponentHealth>;
}

export interface HealthMonitorDeps {
	store: Pick<TimeTrackingStore, "ping">;
	events: Pick<EventSink, "probe">;
	scheduler: Pick<JobScheduler, "getLedger">;
	probeTimeoutMs: number;
	/** How late a job's next fire time may be. Defaults to three ticks. */
	nextFireGraceMs?: number;
	logger?: Logger;
	now?: () => Date;
}

/** A probe resolves with details when the component is up */
type Probe = () => Promise<{ message: string; details?: Record<string, unknown> }>;

// ============================================
// Monitor
// ============================================

export class HealthMonitor {
	private readonly deps: HealthMonitorDeps;
	private readonly log: Logger;
	private readonly now: () => Date;
	private timer: NodeJS.Timeout | null = null;
	private lastVerdict: HealthVerdict | null = null;

	constructor(deps: HealthMonitorDeps) {
		this.deps = deps;
		this.log = deps.logger ?? defaultLog;
		this.now = deps.now ?? (() => new Date());
	}

	async check(): Promise<HealthVerdict> {
		const [storage, messaging, scheduler] = await Promise.all([
			this.runProbe("storage", async () => {
				await this.deps.store.ping();
				return { message: "Store answered ping" };
			}),
			this.runProbe("messaging", async () => {
				await this.deps.events.probe();
				return { message: "Event sink reachable" };
			}),
			this.runProbe("scheduler", async () => this.probeScheduler(this.deps.scheduler.getLedger())),
		]);

		const components = { storage, messaging, scheduler };
		const degraded = Object.values(components).some((component) => component.status === "down");
		const verdict: HealthVerdict = {
			status: degraded ? "degraded" : "healthy",
			checkedAt: this.now(),
			components,
		};

		this.lastVerdict = verdict;
		return verdict;
	}

	getLastVerdict(): HealthVerdict | null {
		return this.lastVerdict;
	}

	start(intervalMs: number): void {
		if (this.timer) {
			return;
		}

		this.timer = setInterval(() => {
			this.check()
				.then((verdict) => {
					if (verdict.status === "degraded") {
						const down = Object.entries(verdict.components)
							.filter(([, component]) => component.status === "down")
							.map(([name, component]) => ({ name, message: component.message }));
						this.log.warn({ down }, "Health degraded");
					}
				})
				.catch((error: unknown) => {
					this.log.error({ error: formatError(error) }, "Health check failed");
				});
		}, intervalMs);
		this.timer.unref();

		this.log.info({ intervalMs }, "Health monitor started");
	}

	stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}

	private async runProbe(name: ComponentName, probe: Probe): Promise<ComponentHealth> {
		const startedAt = Date.now();
		let timeout: NodeJS.Timeout | undefined;
		const expired = new Promise<never>((_, reject) => {
			timeout = setTimeout(() => {
				reject(new Error(`${name} probe timed out after ${this.deps.probeTimeoutMs}ms`));
			}, this.deps.probeTimeoutMs);
		});

		try {
			const result = await Promise.race([probe(), expired]);
			return { status: "up", latencyMs: Date.now() - startedAt, ...result };
		} catch (error) {
			return { status: "down", latencyMs: Date.now() - startedAt, message: formatError(error) };
		} finally {
			clearTimeout(timeout);
		}
	}

	private probeScheduler(ledger: SchedulerLedger): { message: string; details: Record<string, unknown> } {
		const now = this.now().getTime();
		const staleAfterMs = 3 * ledger.tickMs;
		const graceMs = this.deps.nextFireGraceMs ?? staleAfterMs;
		const details = {
			tickMs: ledger.tickMs,
			lastTickAt: ledger.lastTickAt?.toISOString() ?? null,
			jobs: ledger.jobs.length,
		};

		if (!ledger.started) {
			throw new Error("Tick loop is not running");
		}
		if (ledger.lastTickAt && now - ledger.lastTickAt.getTime() > staleAfterMs) {
			throw new Error(`No tick for ${now - ledger.lastTickAt.getTime()}ms`);
		}

		const overdue = ledger.jobs
			.filter((job) => job.nextFireAt !== null && now - job.nextFireAt.getTime() > graceMs)
			.map((job) => job.id);
		if (overdue.length > 0) {
			throw new Error(`Jobs overdue: ${overdue.join(", ")}`);
		}

		return { message: "Tick loop running", details };
	}
}
