/**
 * Health Server
 *
 * HTTP endpoint for health checks, job status and manual job triggers.
 */

import { type ServerType, serve } from "@hono/node-server";
import { NotFoundError } from "@shiftlog/domain";
import { formatError } from "@shiftlog/logger";
import { Hono } from "hono";
import type { HealthMonitor, HealthVerdict } from "../contexts/monitoring/health-monitor.js";
import {
	type JobOutcome,
	type JobScheduler,
	type JobStatus,
	SchedulerStoppingError,
} from "../contexts/scheduling/job-scheduler.js";
import { describeTrigger } from "../contexts/scheduling/triggers.js";
import { log } from "./logger.js";

// ============================================
// Health Server Deps
// ============================================

export interface HealthServerDeps {
	monitor: Pick<HealthMonitor, "check">;
	scheduler: Pick<JobScheduler, "getJobStatus" | "triggerJob">;
	startedAt: Date;
	now?: () => Date;
}

// ============================================
// App
// ============================================

export function createHealthApp(deps: HealthServerDeps): Hono {
	const now = deps.now ?? (() => new Date());
	const app = new Hono();

	app.get("/health", async (c) => {
		const verdict = await deps.monitor.check();
		const body = {
			...formatVerdict(verdict),
			uptime_ms: now().getTime() - deps.startedAt.getTime(),
			started_at: deps.startedAt.toISOString(),
		};
		return c.json(body, verdict.status === "healthy" ? 200 : 503);
	});

	app.get("/jobs", (c) => {
		const jobs = Object.values(deps.scheduler.getJobStatus()).map(formatJob);
		return c.json({ jobs });
	});

	app.post("/jobs/:id/trigger", async (c) => {
		const id = c.req.param("id");
		log.info({ job: id }, "Job trigger requested via HTTP");

		try {
			const outcome = await deps.scheduler.triggerJob(id);
			log.info({ job: id, status: outcome.status }, "Job trigger completed");
			return c.json({ job: id, ...formatOutcome(outcome) }, outcome.status === "failed" ? 500 : 200);
		} catch (error) {
			if (error instanceof NotFoundError) {
				return c.json({ error: `Unknown job: ${id}` }, 404);
			}
			if (error instanceof SchedulerStoppingError) {
				return c.json({ error: "Scheduler is stopping" }, 503);
			}
			log.error({ job: id, error: formatError(error) }, "Job trigger failed");
			return c.json({ error: formatError(error) }, 500);
		}
	});

	app.notFound((c) => c.json({ error: "Not found" }, 404));

	return app;
}

export function createHealthServer(deps: HealthServerDeps, port: number) {
	const app = createHealthApp(deps);
	let server: ServerType | null = null;

	function start(): void {
		server = serve({ fetch: app.fetch, port });
		log.info({ port }, "Health endpoint listening");
	}

	function stop(): Promise<void> {
		const current = server;
		server = null;
		if (!current) {
			return Promise.resolve();
		}
		return new Promise((resolve, reject) => {
			current.close((error) => {
				if (error) {
					reject(error);
					return;
				}
				log.info({ port }, "Health endpoint stopped");
				resolve();
			});
		});
	}

	return { app, start, stop };
}

// ============================================
// Formatting
// ============================================

function formatVerdict(verdict: HealthVerdict) {
	return {
		status: verdict.status,
		checked_at: verdict.checkedAt.toISOString(),
		components: Object.fromEntries(
			Object.entries(verdict.components).map(([name, component]) => [
				name,
				{
					status: component.status,
					latency_ms: component.latencyMs,
					message: component.message,
					details: component.details ?? null,
				},
			]),
		),
	};
}

function formatOutcome(outcome: JobOutcome) {
	switch (outcome.status) {
		case "skipped":
			return { status: outcome.status, fired_at: outcome.firedAt.toISOString(), reason: outcome.reason };
		case "succeeded":
			return {
				status: outcome.status,
				run_id: outcome.runId,
				fired_at: outcome.firedAt.toISOString(),
				duration_ms: outcome.durationMs,
				processed: outcome.result.processed,
				failed: outcome.result.failed,
			};
		case "failed":
			return {
				status: outcome.status,
				run_id: outcome.runId,
				fired_at: outcome.firedAt.toISOString(),
				duration_ms: outcome.durationMs,
				error: outcome.error,
			};
		case "cancelled":
			return {
				status: outcome.status,
				run_id: outcome.runId,
				fired_at: outcome.firedAt.toISOString(),
				duration_ms: outcome.durationMs,
			};
	}
}

function formatJob(job: JobStatus) {
	return {
		id: job.id,
		description: job.description,
		trigger: describeTrigger(job.trigger),
		running: job.running,
		last_run: job.lastRunAt?.toISOString() ?? null,
		last_success: job.lastSuccessAt?.toISOString() ?? null,
		next_run: job.nextFireAt?.toISOString() ?? null,
		run_count: job.runCount,
		skip_count: job.skipCount,
		failure_count: job.failureCount,
		last_outcome: job.lastOutcome ? formatOutcome(job.lastOutcome) : null,
	};
}
