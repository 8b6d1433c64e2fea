/**
 * Job Scheduler
 *
 * Owns the registry of recurring jobs and drives them from one tick loop.
 *
 * - Single-flight: a firing while the job is running is dropped and recorded
 *   as skipped, never queued.
 * - A throwing callback is recorded as failed and reported as a `job_failed`
 *   event; other jobs and the loop are unaffected.
 * - Missed firings are not caught up: after every firing the next fire time
 *   is recomputed from the current time.
 */

import { randomUUID } from "node:crypto";
import { JobExecutionError, NotFoundError, ValidationError } from "@shiftlog/domain";
import { formatError, type Logger, withJobContext } from "@shiftlog/logger";
import { log as defaultLog } from "../../shared/logger.js";
import type { EventSink } from "../events/event-sink.js";
import { createTriggerEvaluator, describeTrigger, type JobTrigger, type TriggerEvaluator } from "./triggers.js";

// ============================================
// Types
// ============================================

export interface JobDescriptor {
	id: string;
	description?: string;
}

export interface JobResult {
	processed: number;
	failed: number;
}

export interface JobRunContext {
	jobId: string;
	runId: string;
	/** Scheduled fire time, or the request time for manual runs */
	firedAt: Date;
	/** Aborted on shutdown. Check between units of work. */
	signal: AbortSignal;
	log: Logger;
}

export type JobCallback = (context: JobRunContext) => Promise<JobResult>;

export type JobOutcome =
	| { status: "succeeded"; runId: string; firedAt: Date; finishedAt: Date; durationMs: number; result: JobResult }
	| { status: "failed"; runId: string; firedAt: Date; finishedAt: Date; durationMs: number; error: string }
	| { status: "cancelled"; runId: string; firedAt: Date; finishedAt: Date; durationMs: number }
	| { status: "skipped"; firedAt: Date; reason: string };

export interface JobStatus {
	id: string;
	description: string | null;
	trigger: JobTrigger;
	running: boolean;
	lastRunAt: Date | null;
	lastFinishedAt: Date | null;
	lastSuccessAt: Date | null;
	lastOutcome: JobOutcome | null;
	nextFireAt: Date | null;
	runCount: number;
	skipCount: number;
	failureCount: number;
	/** Most recent outcomes, newest last */
	history: JobOutcome[];
}

export interface SchedulerLedger {
	started: boolean;
	tickMs: number;
	lastTickAt: Date | null;
	jobs: JobStatus[];
}

export interface StopResult {
	completed: string[];
	pending: string[];
}

export interface JobSchedulerOptions {
	tickMs?: number;
	/** Outcomes kept per job */
	historyLimit?: number;
	events?: EventSink;
	logger?: Logger;
	now?: () => Date;
}

interface JobEntry {
	descriptor: JobDescriptor;
	evaluator: TriggerEvaluator;
	callback: JobCallback;
	running: boolean;
	controller: AbortController | null;
	lastRunAt: Date | null;
	lastFinishedAt: Date | null;
	lastSuccessAt: Date | null;
	lastOutcome: JobOutcome | null;
	nextFireAt: Date | null;
	runCount: number;
	skipCount: number;
	failureCount: number;
	history: JobOutcome[];
}

export const SKIPPED_REASON = "previous run in progress";

/** Manual trigger refused because `stop()` has been called */
export class SchedulerStoppingError extends Error {
	constructor(readonly jobId: string) {
		super(`Scheduler is stopping; job "${jobId}" was not started`);
		this.name = "SchedulerStoppingError";
	}
}

const DEFAULT_TICK_MS = 30_000;
const DEFAULT_HISTORY_LIMIT = 20;

// ============================================
// Scheduler
// ============================================

export class JobScheduler {
	private readonly jobs = new Map<string, JobEntry>();
	private readonly inFlight = new Map<string, Promise<JobOutcome>>();
	private readonly tickMs: number;
	private readonly historyLimit: number;
	private readonly events: EventSink | undefined;
	private readonly log: Logger;
	private readonly now: () => Date;
	private timer: NodeJS.Timeout | null = null;
	private lastTickAt: Date | null = null;
	private stopping = false;

	constructor(options: JobSchedulerOptions = {}) {
		this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
		this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
		this.events = options.events;
		this.log = options.logger ?? defaultLog;
		this.now = options.now ?? (() => new Date());
	}

	register(descriptor: JobDescriptor, trigger: JobTrigger, callback: JobCallback): void {
		if (this.jobs.has(descriptor.id)) {
			throw new ValidationError(`Job "${descriptor.id}" is already registered`, [
				{ path: "id", message: "Job ids must be unique" },
			]);
		}

		const evaluator = createTriggerEvaluator(trigger);
		this.jobs.set(descriptor.id, {
			descriptor,
			evaluator,
			callback,
			running: false,
			controller: null,
			lastRunAt: null,
			lastFinishedAt: null,
			lastSuccessAt: null,
			lastOutcome: null,
			nextFireAt: evaluator.nextAfter(this.now()),
			runCount: 0,
			skipCount: 0,
			failureCount: 0,
			history: [],
		});

		this.log.info({ job: descriptor.id, trigger: describeTrigger(trigger) }, "Registered job");
	}

	get isStarted(): boolean {
		return this.timer !== null;
	}

	start(): void {
		if (this.timer) {
			return;
		}

		this.stopping = false;
		const now = this.now();
		for (const [id, job] of this.jobs) {
			job.nextFireAt = job.evaluator.nextAfter(now);
			this.log.info({ job: id, nextRun: job.nextFireAt?.toISOString() ?? "none" }, "Scheduled job");
		}

		this.lastTickAt = now;
		this.timer = setInterval(() => {
			this.tick().catch((error: unknown) => {
				this.log.error({ error: formatError(error) }, "Scheduler tick failed");
			});
		}, this.tickMs);
		this.timer.unref();

		this.log.info({ tickMs: this.tickMs, jobs: this.jobs.size }, "Job scheduler started");
	}

	/**
	 * Fire every job whose next fire time has passed. Resolves when the runs
	 * started by this pass have finished.
	 */
	tick(now: Date = this.now()): Promise<void> {
		this.lastTickAt = now;
		const launched: Promise<JobOutcome>[] = [];

		for (const job of this.jobs.values()) {
			if (!job.nextFireAt || job.nextFireAt.getTime() > now.getTime()) {
				continue;
			}

			const firedAt = job.nextFireAt;
			job.nextFireAt = job.evaluator.nextAfter(now);

			const run = this.fire(job, firedAt);
			if (run) {
				launched.push(run);
			}
		}

		return Promise.all(launched).then(() => undefined);
	}

	/**
	 * Run a job now through the same single-flight path as scheduled firings.
	 * Refused once `stop()` has been called.
	 */
	triggerJob(jobId: string): Promise<JobOutcome> {
		const job = this.jobs.get(jobId);
		if (!job) {
			return Promise.reject(new NotFoundError("job", jobId));
		}
		if (this.stopping) {
			return Promise.reject(new SchedulerStoppingError(jobId));
		}

		const firedAt = this.now();
		const run = this.fire(job, firedAt);
		if (run) {
			return run;
		}
		return Promise.resolve(job.history.at(-1) ?? { status: "skipped", firedAt, reason: SKIPPED_REASON });
	}

	getJobStatus(): Record<string, JobStatus> {
		const result: Record<string, JobStatus> = {};
		for (const [id, job] of this.jobs) {
			result[id] = toStatus(job);
		}
		return result;
	}

	getLedger(): SchedulerLedger {
		return {
			started: this.isStarted,
			tickMs: this.tickMs,
			lastTickAt: this.lastTickAt,
			jobs: [...this.jobs.values()].map(toStatus),
		};
	}

	/**
	 * Halt the tick loop, abort in-flight runs and wait up to `deadlineMs`
	 * for them to return.
	 */
	async stop(deadlineMs: number): Promise<StopResult> {
		this.stopping = true;
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}

		const running = [...this.inFlight.entries()];
		for (const [id] of running) {
			this.jobs.get(id)?.controller?.abort(new Error("Scheduler stopping"));
		}

		const completed = new Set<string>();
		let deadlineTimer: NodeJS.Timeout | undefined;
		const deadline = new Promise<void>((resolve) => {
			deadlineTimer = setTimeout(resolve, deadlineMs);
		});

		await Promise.race([
			Promise.all(running.map(([id, run]) => run.then(() => completed.add(id)))),
			deadline,
		]);
		clearTimeout(deadlineTimer);

		const result = {
			completed: running.map(([id]) => id).filter((id) => completed.has(id)),
			pending: running.map(([id]) => id).filter((id) => !completed.has(id)),
		};
		this.log.info(result, "Job scheduler stopped");
		return result;
	}

	private fire(job: JobEntry, firedAt: Date): Promise<JobOutcome> | null {
		const id = job.descriptor.id;

		if (job.running) {
			job.skipCount += 1;
			this.record(job, { status: "skipped", firedAt, reason: SKIPPED_REASON });
			this.log.warn(
				{ job: id, firedAt: firedAt.toISOString(), startedAt: job.lastRunAt?.toISOString() },
				"Job execution skipped - previous run still in progress",
			);
			return null;
		}

		const run = this.execute(job, firedAt).finally(() => {
			this.inFlight.delete(id);
		});
		this.inFlight.set(id, run);
		return run;
	}

	private async execute(job: JobEntry, firedAt: Date): Promise<JobOutcome> {
		const id = job.descriptor.id;
		const runId = randomUUID();
		const controller = new AbortController();
		const runLog = withJobContext(this.log, { jobId: id, runId, firedAt: firedAt.toISOString() });

		job.running = true;
		job.controller = controller;
		const startedAt = this.now();
		job.lastRunAt = startedAt;
		job.runCount += 1;

		let outcome: JobOutcome;
		try {
			runLog.info({}, "Job started");
			const result = await job.callback({ jobId: id, runId, firedAt, signal: controller.signal, log: runLog });
			const finishedAt = this.now();
			const durationMs = finishedAt.getTime() - startedAt.getTime();

			if (controller.signal.aborted) {
				outcome = { status: "cancelled", runId, firedAt, finishedAt, durationMs };
				runLog.warn({ durationMs, ...result }, "Job cancelled");
			} else {
				outcome = { status: "succeeded", runId, firedAt, finishedAt, durationMs, result };
				job.lastSuccessAt = finishedAt;
				runLog.info({ durationMs, ...result }, "Job completed");
			}
		} catch (error) {
			const finishedAt = this.now();
			const durationMs = finishedAt.getTime() - startedAt.getTime();

			if (controller.signal.aborted) {
				outcome = { status: "cancelled", runId, firedAt, finishedAt, durationMs };
				runLog.warn({ durationMs, error: formatError(error) }, "Job cancelled");
			} else {
				const failure = new JobExecutionError(id, error);
				outcome = { status: "failed", runId, firedAt, finishedAt, durationMs, error: failure.message };
				job.failureCount += 1;
				runLog.error({ durationMs, error: failure.message }, "Job failed");
			}
		} finally {
			job.running = false;
			job.controller = null;
			job.lastFinishedAt = this.now();
		}

		this.record(job, outcome);
		if (outcome.status === "failed") {
			await this.reportFailure(outcome, id, runLog);
		}
		return outcome;
	}

	private async reportFailure(
		outcome: Extract<JobOutcome, { status: "failed" }>,
		jobId: string,
		runLog: Logger,
	): Promise<void> {
		if (!this.events) {
			return;
		}
		try {
			await this.events.emit({
				type: "job_failed",
				occurredAt: outcome.finishedAt.toISOString(),
				jobId,
				runId: outcome.runId,
				error: outcome.error,
			});
		} catch (error) {
			runLog.error({ error: formatError(error) }, "Failed to emit job_failed event");
		}
	}

	private record(job: JobEntry, outcome: JobOutcome): void {
		job.lastOutcome = outcome;
		job.history.push(outcome);
		if (job.history.length > this.historyLimit) {
			job.history.splice(0, job.history.length - this.historyLimit);
		}
	}
}

function toStatus(job: JobEntry): JobStatus {
	return {
		id: job.descriptor.id,
		description: job.descriptor.description ?? null,
		trigger: job.evaluator.trigger,
		running: job.running,
		lastRunAt: job.lastRunAt,
		lastFinishedAt: job.lastFinishedAt,
		lastSuccessAt: job.lastSuccessAt,
		lastOutcome: job.lastOutcome,
		nextFireAt: job.nextFireAt,
		runCount: job.runCount,
		skipCount: job.skipCount,
		failureCount: job.failureCount,
		history: [...job.history],
	};
}
